// Typed failures of the recommendation pipeline. Routes map `statusCode`/`code`
// onto the HTTP response; the engine recovers EmbeddingUnavailable and
// RerankUnavailable locally and never lets them reach the caller.

export type RecommendationErrorCode =
  | 'invalid_query'
  | 'embedding_unavailable'
  | 'rerank_unavailable'
  | 'index_not_ready'
  | 'internal_inconsistency';

export abstract class RecommendationError extends Error {
  abstract readonly code: RecommendationErrorCode;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    readonly metadata: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      metadata: this.metadata,
    };
  }
}

/** Empty or unusable query text. Not retried. */
export class InvalidQuery extends RecommendationError {
  readonly code = 'invalid_query';
  readonly statusCode = 400;
}

/** The embedding capability failed, timed out or returned an unusable vector. */
export class EmbeddingUnavailable extends RecommendationError {
  readonly code = 'embedding_unavailable';
  readonly statusCode = 503;
}

/** The reasoning service failed, timed out, or returned something other than a permutation. */
export class RerankUnavailable extends RecommendationError {
  readonly code = 'rerank_unavailable';
  readonly statusCode = 502;
}

/** No catalog snapshot has been built yet. */
export class IndexNotReady extends RecommendationError {
  readonly code = 'index_not_ready';
  readonly statusCode = 503;
}

/** Corrupt build state, e.g. an embedding of the wrong dimension. Fatal at startup. */
export class InternalInconsistency extends RecommendationError {
  readonly code = 'internal_inconsistency';
  readonly statusCode = 500;
}

export function isRecommendationError(value: unknown): value is RecommendationError {
  return value instanceof RecommendationError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
