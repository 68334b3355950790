// Persisted catalog embeddings. A stored vector is reused only when the
// embedder id, the dimension and the hash of the record's canonical text match.
import { createHash } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Embedding } from '@/types/catalog';
import { logger } from '@/services/logger';

const STORE_VERSION = 1;

const storeSchema = z.object({
  version: z.literal(STORE_VERSION),
  embedderId: z.string(),
  dimension: z.number().int().positive(),
  entries: z.record(
    z.object({
      hash: z.string(),
      vector: z.array(z.number()),
    }),
  ),
});

export interface StoredEmbedding {
  hash: string;
  vector: Embedding;
}

export function hashText(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

export async function loadEmbeddingStore(
  filePath: string,
  embedderId: string,
  dimension: number,
): Promise<Map<string, StoredEmbedding>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      logger.info('embedding-store:missing', { filePath });
      return new Map();
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    logger.warn('embedding-store:parse_error', { filePath });
    return new Map();
  }
  const parsed = storeSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn('embedding-store:invalid', { filePath, issues: parsed.error.errors.length });
    return new Map();
  }
  const store = parsed.data;
  if (store.embedderId !== embedderId || store.dimension !== dimension) {
    logger.info('embedding-store:stale', {
      filePath,
      stored: `${store.embedderId}/${store.dimension}`,
      current: `${embedderId}/${dimension}`,
    });
    return new Map();
  }

  const entries = new Map<string, StoredEmbedding>();
  for (const [id, entry] of Object.entries(store.entries)) {
    if (entry.vector.length === dimension) entries.set(id, entry);
  }
  return entries;
}

export async function saveEmbeddingStore(
  filePath: string,
  embedderId: string,
  dimension: number,
  entries: Map<string, StoredEmbedding>,
): Promise<void> {
  const payload = {
    version: STORE_VERSION,
    embedderId,
    dimension,
    entries: Object.fromEntries(entries),
  };
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(payload), 'utf8');
  await fs.rename(tmp, filePath);
  logger.info('embedding-store:saved', { filePath, count: entries.size });
}
