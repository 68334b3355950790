// src/services/recommendation-engine.ts: recommend(query, k) over the current catalog snapshot.
// Validate → Embed → Retrieve(overfetch × k) → Balance(k) → Rerank (best-effort) → Finalize.
// Embedding and rerank failures degrade locally; only invalid input and a missing
// index reach the caller.
import type {
  CatalogRecord,
  RankedCandidate,
  RecommendationResult,
  ScoringStrategy,
} from '@/types/catalog';
import {
  EmbeddingUnavailable,
  IndexNotReady,
  InvalidQuery,
  errorMessage,
} from '@/errors/recommendation-errors';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import type { CatalogProvider } from '@/services/providers/catalog/catalog-provider';
import { buildCatalogSnapshot, type CatalogIndexHolder, type CatalogSnapshot } from '@/services/catalog-index';
import { balanceCandidates } from '@/services/diversity-balancer';
import { assertPermutation, type Reranker } from '@/services/rerank';
import { CircuitBreaker, type CircuitState } from '@/stability/circuitBreaker';
import { logger } from '@/services/logger';

export interface RecommendationEngineOptions {
  maxQueryLength: number;
  defaultResults: number;
  /** Hard ceiling on k. */
  maxResults: number;
  overfetchFactor: number;
  diversityMinScore: number;
  embeddingTimeoutMs: number;
  rerankTimeoutMs: number;
  /** Reuse window for the health() embedding probe; 0 probes every call. */
  healthProbeTtlMs: number;
}

export const DEFAULT_ENGINE_OPTIONS: RecommendationEngineOptions = {
  maxQueryLength: 2000,
  defaultResults: 10,
  maxResults: 10,
  overfetchFactor: 3,
  diversityMinScore: 0,
  embeddingTimeoutMs: 2000,
  rerankTimeoutMs: 4000,
  healthProbeTtlMs: 5000,
};

export interface RecommendationEngineDeps {
  holder: CatalogIndexHolder;
  embedder: Embedder;
  reranker?: Reranker | null;
  /** Source for reload(); omitted when snapshots are swapped in by the caller. */
  catalogProvider?: CatalogProvider;
  embeddingsCachePath?: string;
  options?: Partial<RecommendationEngineOptions>;
  embeddingBreaker?: CircuitBreaker;
  rerankBreaker?: CircuitBreaker;
}

export interface RecommendOptions {
  signal?: AbortSignal;
}

/** What the HTTP layer and the evaluator depend on. */
export interface Recommender {
  recommend(queryText: string, k?: number, options?: RecommendOptions): Promise<RecommendationResult>;
}

export type HealthStatus = 'healthy' | 'degraded' | 'unavailable';

export interface EngineHealth {
  status: HealthStatus;
  catalog: {
    loaded: boolean;
    size: number;
    builtAt: string | null;
    mode: 'vector' | 'lexical-only' | null;
  };
  embedding: {
    provider: string;
    reachable: boolean;
    circuit: CircuitState;
  };
  reranker: {
    enabled: boolean;
    name: string | null;
    circuit: CircuitState | null;
  };
}

interface Retrieval {
  scoring: ScoringStrategy;
  candidates: RankedCandidate[];
}

export class RecommendationEngine implements Recommender {
  private readonly options: RecommendationEngineOptions;
  private readonly embeddingBreaker: CircuitBreaker;
  private readonly rerankBreaker: CircuitBreaker;
  private reloading: Promise<CatalogSnapshot> | null = null;
  private lastProbe: { reachable: boolean; checkedAt: number } | null = null;

  constructor(private readonly deps: RecommendationEngineDeps) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...deps.options };
    this.embeddingBreaker =
      deps.embeddingBreaker ??
      new CircuitBreaker('embedding', {
        failureThreshold: 3,
        successThreshold: 1,
        timeout: this.options.embeddingTimeoutMs,
        resetTimeout: 30000,
      });
    this.rerankBreaker =
      deps.rerankBreaker ??
      new CircuitBreaker('rerank', {
        failureThreshold: 3,
        successThreshold: 1,
        timeout: this.options.rerankTimeoutMs,
        resetTimeout: 60000,
      });
  }

  async recommend(
    queryText: string,
    k?: number,
    options: RecommendOptions = {},
  ): Promise<RecommendationResult> {
    const { signal } = options;
    const snapshot = this.deps.holder.current();
    if (!snapshot) {
      throw new IndexNotReady('Catalog index has not been built yet');
    }

    const query = this.validateQuery(queryText);
    const size = this.clampResultCount(k);

    if (snapshot.records.length === 0) {
      logger.warn('engine:empty_catalog');
      return { records: [], scoring: snapshot.index ? 'vector' : 'lexical', reranked: false };
    }

    const poolSize = Math.min(size * this.options.overfetchFactor, snapshot.records.length);
    const retrieval = await this.retrieve(query, poolSize, snapshot, signal);

    const balanced = balanceCandidates(retrieval.candidates, size, this.options.diversityMinScore);
    const shortlist = balanced.map((c) => c.record);

    const { records, reranked } = await this.tryRerank(query, shortlist, signal);
    const final = finalize(records, size);

    logger.debug('engine:recommended', {
      size: final.length,
      pool: retrieval.candidates.length,
      scoring: retrieval.scoring,
      reranked,
    });
    return { records: final, scoring: retrieval.scoring, reranked };
  }

  /**
   * Rebuilds the snapshot from the catalog provider and swaps it in. Concurrent
   * calls share one rebuild.
   */
  async reload(): Promise<CatalogSnapshot> {
    const provider = this.deps.catalogProvider;
    if (!provider) {
      throw new Error('RecommendationEngine.reload requires a catalog provider');
    }
    if (this.reloading) return this.reloading;

    this.reloading = (async () => {
      const records = await provider.loadRecords();
      const snapshot = await buildCatalogSnapshot(records, {
        embedder: this.deps.embedder,
        embeddingsCachePath: this.deps.embeddingsCachePath,
      });
      const previous = this.deps.holder.swap(snapshot);
      logger.info('engine:snapshot_swapped', {
        provider: provider.name,
        records: snapshot.records.length,
        previous: previous?.records.length ?? null,
      });
      return snapshot;
    })();

    try {
      return await this.reloading;
    } finally {
      this.reloading = null;
    }
  }

  async health(): Promise<EngineHealth> {
    const snapshot = this.deps.holder.current();
    const { embedder } = this.deps;

    const reachable = await this.probeEmbedder();

    // The provider came back after a lexical-only build: rebuild in the background.
    if (reachable && snapshot && !snapshot.index && snapshot.records.length > 0 && this.deps.catalogProvider) {
      this.scheduleRecoveryReload();
    }

    let status: HealthStatus = 'unavailable';
    if (snapshot) {
      status = reachable && snapshot.index && snapshot.records.length > 0 ? 'healthy' : 'degraded';
    }

    return {
      status,
      catalog: {
        loaded: snapshot !== null,
        size: snapshot?.records.length ?? 0,
        builtAt: snapshot?.builtAt.toISOString() ?? null,
        mode: snapshot ? (snapshot.index ? 'vector' : 'lexical-only') : null,
      },
      embedding: {
        provider: embedder.id,
        reachable,
        circuit: this.embeddingBreaker.getState(),
      },
      reranker: {
        enabled: Boolean(this.deps.reranker),
        name: this.deps.reranker?.name ?? null,
        circuit: this.deps.reranker ? this.rerankBreaker.getState() : null,
      },
    };
  }

  private async probeEmbedder(): Promise<boolean> {
    const now = Date.now();
    if (this.lastProbe && now - this.lastProbe.checkedAt < this.options.healthProbeTtlMs) {
      return this.lastProbe.reachable;
    }

    const { embedder } = this.deps;
    let reachable = false;
    try {
      const probe = await this.embeddingBreaker.execute((signal) => embedder.embed('health check', { signal }), {
        timeoutMs: this.options.embeddingTimeoutMs,
      });
      reachable = probe.length === embedder.dimension;
    } catch (err) {
      logger.warn('engine:health_probe_failed', { embedder: embedder.id, error: errorMessage(err) });
    }
    this.lastProbe = { reachable, checkedAt: now };
    return reachable;
  }

  private scheduleRecoveryReload(): void {
    if (this.reloading) return;
    logger.info('engine:recovery_reload');
    void this.reload().then(
      (snapshot) => {
        logger.info('engine:recovery_reload_done', { mode: snapshot.index ? 'vector' : 'lexical-only' });
      },
      (err: unknown) => {
        logger.error('engine:recovery_reload_failed', { error: errorMessage(err) });
      },
    );
  }

  private validateQuery(queryText: unknown): string {
    if (typeof queryText !== 'string' || queryText.trim().length === 0) {
      throw new InvalidQuery('Query must be a non-empty string');
    }
    const query = queryText.trim();
    if (query.length > this.options.maxQueryLength) {
      logger.info('engine:query_truncated', {
        length: query.length,
        maxQueryLength: this.options.maxQueryLength,
      });
      return query.slice(0, this.options.maxQueryLength);
    }
    return query;
  }

  private clampResultCount(k: number | undefined): number {
    if (k === undefined || !Number.isFinite(k)) return this.options.defaultResults;
    return Math.max(1, Math.min(Math.floor(k), this.options.maxResults));
  }

  private async retrieve(
    query: string,
    poolSize: number,
    snapshot: CatalogSnapshot,
    signal: AbortSignal | undefined,
  ): Promise<Retrieval> {
    if (snapshot.index) {
      try {
        const vector = await this.embedQuery(query, snapshot, signal);
        return { scoring: 'vector', candidates: snapshot.index.topN(vector, poolSize) };
      } catch (err) {
        if (signal?.aborted) throw err;
        logger.warn('engine:embedding_fallback', { error: errorMessage(err) });
      }
    }
    signal?.throwIfAborted();
    return { scoring: 'lexical', candidates: snapshot.lexical.topN(query, poolSize) };
  }

  private async embedQuery(
    query: string,
    snapshot: CatalogSnapshot,
    signal: AbortSignal | undefined,
  ): Promise<number[]> {
    const { embedder } = this.deps;
    if (snapshot.embedderId !== embedder.id) {
      throw new EmbeddingUnavailable(
        `Snapshot was built with "${snapshot.embedderId}" but queries use "${embedder.id}"`,
      );
    }
    try {
      return await this.embeddingBreaker.execute((s) => embedder.embed(query, { signal: s }), {
        signal,
        timeoutMs: this.options.embeddingTimeoutMs,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new EmbeddingUnavailable('Embedding provider could not embed the query', { embedder: embedder.id }, { cause: err });
    }
  }

  private async tryRerank(
    query: string,
    shortlist: CatalogRecord[],
    signal: AbortSignal | undefined,
  ): Promise<{ records: CatalogRecord[]; reranked: boolean }> {
    const { reranker } = this.deps;
    if (!reranker || shortlist.length < 2) return { records: shortlist, reranked: false };

    try {
      const reordered = await this.rerankBreaker.execute(
        (s) => reranker.rerank(query, shortlist, { signal: s }),
        { signal, timeoutMs: this.options.rerankTimeoutMs },
      );
      assertPermutation(shortlist, reordered);
      return { records: reordered, reranked: true };
    } catch (err) {
      if (signal?.aborted) throw err;
      logger.warn('engine:rerank_skipped', { reranker: reranker.name, error: errorMessage(err) });
      return { records: shortlist, reranked: false };
    }
  }
}

function finalize(records: readonly CatalogRecord[], size: number): CatalogRecord[] {
  const seen = new Set<string>();
  const out: CatalogRecord[] = [];
  for (const r of records) {
    if (out.length >= size) break;
    if (seen.has(r.id)) continue;
    seen.add(r.id);
    out.push(r);
  }
  return out;
}
