// Immutable catalog snapshots and the process-wide holder that swaps them.
// A snapshot is built completely before it is published; requests read the
// reference once and keep using that snapshot even if a reload swaps it.
import type { CatalogRecord, Embedding } from '@/types/catalog';
import { InternalInconsistency, errorMessage, isRecommendationError } from '@/errors/recommendation-errors';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import { catalogRecordToText } from '@/services/providers/catalog/catalog-provider';
import {
  hashText,
  loadEmbeddingStore,
  saveEmbeddingStore,
  type StoredEmbedding,
} from '@/services/providers/embedding/embedding-store';
import { VectorIndex } from '@/services/vector-index';
import { LexicalScorer } from '@/services/lexical-scorer';
import { logger } from '@/services/logger';

export interface CatalogSnapshot {
  readonly records: readonly CatalogRecord[];
  /** Null when catalog embeddings could not be computed; queries then rank lexically. */
  readonly index: VectorIndex | null;
  readonly lexical: LexicalScorer;
  readonly embedderId: string;
  readonly builtAt: Date;
}

export interface BuildSnapshotOptions {
  embedder: Embedder;
  /** JSON file reused across restarts to skip re-embedding unchanged records. */
  embeddingsCachePath?: string;
  signal?: AbortSignal;
}

async function embedCatalog(
  records: readonly CatalogRecord[],
  options: BuildSnapshotOptions,
): Promise<Embedding[]> {
  const { embedder, embeddingsCachePath } = options;
  const texts = records.map(catalogRecordToText);
  const hashes = texts.map(hashText);

  const stored = embeddingsCachePath
    ? await loadEmbeddingStore(embeddingsCachePath, embedder.id, embedder.dimension)
    : new Map<string, StoredEmbedding>();

  const vectors: (Embedding | undefined)[] = records.map((r, i) => {
    const hit = stored.get(r.id);
    return hit && hit.hash === hashes[i] ? hit.vector : undefined;
  });
  const missing = vectors.flatMap((v, i) => (v === undefined ? [i] : []));

  if (missing.length > 0) {
    logger.info('catalog-index:embedding', { embedder: embedder.id, count: missing.length, reused: records.length - missing.length });
    const fresh = await embedder.embedBatch(missing.map((i) => texts[i]), { signal: options.signal });
    if (fresh.length !== missing.length) {
      throw new InternalInconsistency(
        `Embedder returned ${fresh.length} vectors for ${missing.length} texts`,
        { embedder: embedder.id },
      );
    }
    missing.forEach((recordIdx, j) => {
      vectors[recordIdx] = fresh[j];
    });
  }

  const complete = vectors.map((v, i) => {
    if (!v) throw new InternalInconsistency(`Missing embedding for record "${records[i].id}"`);
    return v;
  });

  if (embeddingsCachePath && missing.length > 0) {
    const entries = new Map<string, StoredEmbedding>();
    records.forEach((r, i) => entries.set(r.id, { hash: hashes[i], vector: complete[i] }));
    try {
      await saveEmbeddingStore(embeddingsCachePath, embedder.id, embedder.dimension, entries);
    } catch (err) {
      logger.warn('catalog-index:store_save_failed', { path: embeddingsCachePath, error: errorMessage(err) });
    }
  }
  return complete;
}

/**
 * Embeds every record and builds the vector index. Dimension mismatches are
 * InternalInconsistency and propagate; an unreachable embedding provider
 * yields a lexical-only snapshot instead.
 */
export async function buildCatalogSnapshot(
  records: readonly CatalogRecord[],
  options: BuildSnapshotOptions,
): Promise<CatalogSnapshot> {
  const frozen = Object.freeze([...records]);
  let index: VectorIndex | null = null;

  try {
    const vectors = await embedCatalog(frozen, options);
    index = VectorIndex.build(frozen, vectors, options.embedder.dimension);
  } catch (err) {
    if (isRecommendationError(err) || options.signal?.aborted) throw err;
    logger.error('catalog-index:embedding_failed', {
      embedder: options.embedder.id,
      error: errorMessage(err),
    });
  }

  const snapshot: CatalogSnapshot = Object.freeze({
    records: frozen,
    index,
    lexical: new LexicalScorer(frozen),
    embedderId: options.embedder.id,
    builtAt: new Date(),
  });
  logger.info('catalog-index:built', {
    records: frozen.length,
    mode: index ? 'vector' : 'lexical-only',
  });
  return snapshot;
}

/** Holds the current snapshot. Replacement is a single reference swap. */
export class CatalogIndexHolder {
  private snapshot: CatalogSnapshot | null = null;

  current(): CatalogSnapshot | null {
    return this.snapshot;
  }

  /** Publishes `next` and returns the snapshot it replaced. */
  swap(next: CatalogSnapshot): CatalogSnapshot | null {
    const previous = this.snapshot;
    this.snapshot = next;
    return previous;
  }
}
