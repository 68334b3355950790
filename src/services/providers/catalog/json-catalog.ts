// JSON file catalog provider. Accepts the normalized record shape and the shape
// written by the catalog crawler (assessment_name / test_type / "Yes"|"No" flags).
import fs from 'fs/promises';
import { z } from 'zod';
import {
  ASSESSMENT_CATEGORIES,
  type AssessmentCategory,
  type CatalogRecord,
} from '@/types/catalog';
import { logger } from '@/services/logger';
import type { CatalogProvider } from './catalog-provider';

const CATEGORY_ALIASES: Record<string, AssessmentCategory> = {
  a: 'Ability & Aptitude',
  c: 'Ability & Aptitude',
  ability: 'Ability & Aptitude',
  aptitude: 'Ability & Aptitude',
  abilityaptitude: 'Ability & Aptitude',
  cognitive: 'Ability & Aptitude',
  cognitiveability: 'Ability & Aptitude',
  k: 'Knowledge & Skills',
  knowledge: 'Knowledge & Skills',
  skills: 'Knowledge & Skills',
  knowledgeskills: 'Knowledge & Skills',
  p: 'Personality & Behavior',
  personality: 'Personality & Behavior',
  behavior: 'Personality & Behavior',
  behaviour: 'Personality & Behavior',
  personalitybehavior: 'Personality & Behavior',
  personalitybehaviour: 'Personality & Behavior',
  s: 'Simulations',
  simulation: 'Simulations',
  simulations: 'Simulations',
  o: 'Other',
  other: 'Other',
};

/** Maps a free-form category label or single-letter code onto the closed enumeration. */
export function normalizeCategory(label: string): AssessmentCategory {
  const exact = ASSESSMENT_CATEGORIES.find((c) => c.toLowerCase() === label.trim().toLowerCase());
  if (exact) return exact;
  const key = label.toLowerCase().replace(/[^a-z]+/g, '');
  return CATEGORY_ALIASES[key] ?? 'Other';
}

const yesNo = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['yes', 'no', 'true', 'false']))
    .transform((v) => v === 'yes' || v === 'true'),
]);

const duration = z
  .union([z.number(), z.string().trim().regex(/^\d+(\.\d+)?$/).transform(Number), z.null()])
  .transform((v) => (v === null || v < 0 ? null : Math.round(v)));

const categoryList = z
  .union([z.string(), z.array(z.string())])
  .transform((v) => (Array.isArray(v) ? v : [v]))
  .pipe(z.array(z.string().trim().min(1)).min(1, 'at least one category is required'));

const normalizedEntrySchema = z.object({
  id: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1),
  url: z.string().trim().min(1),
  description: z.string().default(''),
  categories: categoryList,
  duration_minutes: duration.optional(),
  adaptive_support: yesNo.default(false),
  remote_support: yesNo.default(false),
});

const scrapedEntrySchema = z.object({
  assessment_name: z.string().trim().min(1),
  url: z.string().trim().min(1),
  description: z.string().default(''),
  test_type: z.string().trim().min(1),
  test_type_full: z.string().optional(),
  category: z.string().optional(),
  duration: duration.optional(),
  adaptive_support: yesNo.default(false),
  remote_support: yesNo.default(false),
});

function toRecord(entry: unknown): CatalogRecord | null {
  const normalized = normalizedEntrySchema.safeParse(entry);
  if (normalized.success) {
    const e = normalized.data;
    return {
      id: e.id ?? e.url,
      name: e.name,
      url: e.url,
      description: e.description.trim(),
      categories: dedupeCategories(e.categories.map(normalizeCategory)),
      durationMinutes: e.duration_minutes ?? null,
      adaptiveSupport: e.adaptive_support,
      remoteSupport: e.remote_support,
    };
  }

  const scraped = scrapedEntrySchema.safeParse(entry);
  if (scraped.success) {
    const e = scraped.data;
    return {
      id: e.url,
      name: e.assessment_name,
      url: e.url,
      description: e.description.trim(),
      categories: [normalizeCategory(e.test_type)],
      durationMinutes: e.duration ?? null,
      adaptiveSupport: e.adaptive_support,
      remoteSupport: e.remote_support,
    };
  }
  return null;
}

function dedupeCategories(categories: AssessmentCategory[]): AssessmentCategory[] {
  return Array.from(new Set(categories));
}

export interface CatalogParseReport {
  records: CatalogRecord[];
  skipped: number;
  duplicates: number;
}

/**
 * Validates raw JSON entries into frozen records. Invalid entries are skipped;
 * on duplicate ids the first occurrence wins.
 */
export function parseCatalogEntries(raw: unknown): CatalogParseReport {
  if (!Array.isArray(raw)) {
    throw new Error('Catalog must be a JSON array of records');
  }

  const seen = new Set<string>();
  const records: CatalogRecord[] = [];
  let skipped = 0;
  let duplicates = 0;

  raw.forEach((entry, index) => {
    const record = toRecord(entry);
    if (!record) {
      skipped++;
      logger.warn('catalog:invalid_entry', { index });
      return;
    }
    if (seen.has(record.id)) {
      duplicates++;
      logger.warn('catalog:duplicate_id', { index, id: record.id });
      return;
    }
    seen.add(record.id);
    records.push(Object.freeze({ ...record, categories: Object.freeze([...record.categories]) }));
  });

  return { records, skipped, duplicates };
}

export class JsonCatalogProvider implements CatalogProvider {
  readonly name = 'json-catalog';

  constructor(private readonly filePath: string) {}

  async loadRecords(): Promise<CatalogRecord[]> {
    const raw = await fs.readFile(this.filePath, 'utf8');
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new Error(`Catalog file ${this.filePath} is not valid JSON`, { cause: err });
    }
    const { records, skipped, duplicates } = parseCatalogEntries(json);
    logger.info('catalog:loaded', { filePath: this.filePath, count: records.length, skipped, duplicates });
    return records;
  }
}
