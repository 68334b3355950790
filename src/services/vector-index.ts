// Exhaustive cosine-similarity index over catalog embeddings.
// Flat scan over every record vector.
import type { CatalogRecord, Embedding, RankedCandidate } from '@/types/catalog';
import { EmbeddingUnavailable, InternalInconsistency } from '@/errors/recommendation-errors';
import { dotProduct, isFiniteVector, normalizeVector } from '@/services/providers/retrieval-vector-utils';

export class VectorIndex {
  private constructor(
    private readonly records: readonly CatalogRecord[],
    private readonly unitVectors: readonly Float64Array[],
    readonly dimension: number,
  ) {}

  /**
   * Builds an index from records and their embeddings (same order).
   * Throws InternalInconsistency on count or dimension mismatch, or a vector
   * that cannot be normalized.
   */
  static build(records: readonly CatalogRecord[], vectors: readonly Embedding[], dimension: number): VectorIndex {
    if (records.length !== vectors.length) {
      throw new InternalInconsistency(
        `Index build received ${vectors.length} embeddings for ${records.length} records`,
        { records: records.length, vectors: vectors.length },
      );
    }

    const unit: Float64Array[] = [];
    vectors.forEach((vector, i) => {
      const id = records[i].id;
      if (vector.length !== dimension) {
        throw new InternalInconsistency(
          `Embedding for record "${id}" has dimension ${vector.length}, expected ${dimension}`,
          { id, actual: vector.length, expected: dimension },
        );
      }
      const normalized = isFiniteVector(vector) ? normalizeVector(vector) : null;
      if (!normalized) {
        throw new InternalInconsistency(`Embedding for record "${id}" is zero or non-finite`, { id });
      }
      unit.push(normalized);
    });

    return new VectorIndex(records, unit, dimension);
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Top `n` records by cosine similarity to `queryVector`, ties kept in
   * catalog order. Length is min(n, size).
   */
  topN(queryVector: Embedding, n: number): RankedCandidate[] {
    if (queryVector.length !== this.dimension) {
      throw new EmbeddingUnavailable(
        `Query embedding has dimension ${queryVector.length}, index expects ${this.dimension}`,
        { actual: queryVector.length, expected: this.dimension },
      );
    }
    const query = isFiniteVector(queryVector) ? normalizeVector(queryVector) : null;
    if (!query) {
      throw new EmbeddingUnavailable('Query embedding is zero or non-finite');
    }

    const limit = Math.max(0, Math.min(Math.floor(n), this.records.length));
    if (limit === 0) return [];

    const scored = this.unitVectors.map((vector, position) => ({
      position,
      similarity: dotProduct(query, vector),
    }));
    // Array.prototype.sort is stable, so equal scores stay in catalog order.
    scored.sort((a, b) => b.similarity - a.similarity);

    return scored.slice(0, limit).map((s, rank): RankedCandidate => ({
      record: this.records[s.position],
      rank,
      score: { kind: 'vector', similarity: s.similarity },
    }));
  }
}
