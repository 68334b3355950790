// src/services/providers/catalog/catalog-provider.ts
// Source of catalog records. The catalog is crawled/curated elsewhere; the service
// only reads a snapshot of it.
import type { CatalogRecord } from '@/types/catalog';

export interface CatalogProvider {
  name: string;
  loadRecords(): Promise<CatalogRecord[]>;
}

/** Text embedded for a record and matched by the lexical fallback. */
export function catalogRecordToText(record: CatalogRecord): string {
  return [record.name, record.description, ...record.categories]
    .map((part) => part.trim())
    .filter(Boolean)
    .join(' ');
}

/** In-memory provider for fixed record sets (tests, scripts). */
export class StaticCatalogProvider implements CatalogProvider {
  readonly name = 'static-catalog';

  constructor(private readonly records: CatalogRecord[]) {}

  async loadRecords(): Promise<CatalogRecord[]> {
    return [...this.records];
  }
}
