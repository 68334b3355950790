// src/services/eval-retrieval.ts
// Offline retrieval metrics: Recall@K, MRR, NDCG@K and category diversity.
// `evaluateRecommender` runs a labeled query set through a Recommender and
// scores its output; it has no side effects besides logging.
import type { CatalogRecord } from '@/types/catalog';
import { primaryCategory } from '@/types/catalog';
import type { Recommender } from '@/services/recommendation-engine';
import { logger } from '@/services/logger';

export interface RetrievalEvalSample {
  query?: string;
  /** Keys judged relevant for the query, unordered. */
  relevantIds: string[];
  /** Keys as the recommender returned them, best first. */
  retrieved: { id: string }[];
}

/** Reciprocal of the 1-based rank of the first relevant key; 0 when none appears. */
export function computeMRR(relevantIds: Set<string>, retrieved: { id: string }[]): number {
  const firstHit = retrieved.findIndex((r) => relevantIds.has(r.id));
  return firstHit === -1 ? 0 : 1 / (firstHit + 1);
}

/** Recall@K: |top K ∩ relevant| / |relevant|; 0 when nothing is relevant. */
export function computeRecallAtK(relevantIds: Set<string>, retrieved: { id: string }[], k: number): number {
  if (relevantIds.size === 0) return 0;
  const topK = new Set(retrieved.slice(0, k).map((r) => r.id));
  let hit = 0;
  for (const id of topK) {
    if (relevantIds.has(id)) hit++;
  }
  return hit / relevantIds.size;
}

const rankDiscount = (position: number): number => 1 / Math.log2(position + 2);

/**
 * Normalized discounted gain over the first k results. Relevance is binary;
 * the ideal ordering puts every relevant key (up to k) first.
 */
export function computeNDCGAtK(relevantIds: Set<string>, retrieved: { id: string }[], k: number): number {
  const gained = retrieved
    .slice(0, k)
    .reduce((sum, r, position) => (relevantIds.has(r.id) ? sum + rankDiscount(position) : sum), 0);
  let ideal = 0;
  for (let position = 0; position < Math.min(relevantIds.size, k); position++) ideal += rankDiscount(position);
  return ideal === 0 ? 0 : gained / ideal;
}

/** Distinct primary categories divided by result count; 0 for an empty list. */
export function computeCategoryDiversity(records: readonly CatalogRecord[]): number {
  if (records.length === 0) return 0;
  return new Set(records.map(primaryCategory)).size / records.length;
}

export interface RetrievalEvalResult {
  mrr: number;
  recallAtK: number;
  ndcgAtK: number;
  sampleCount: number;
  k: number;
}

const DEFAULT_K = 10;

/** Mean of each metric across samples; all zeros for an empty set. */
export function runRetrievalEval(samples: RetrievalEvalSample[], k = DEFAULT_K): RetrievalEvalResult {
  const totals = { mrr: 0, recallAtK: 0, ndcgAtK: 0 };
  for (const sample of samples) {
    const relevant = new Set(sample.relevantIds);
    totals.mrr += computeMRR(relevant, sample.retrieved);
    totals.recallAtK += computeRecallAtK(relevant, sample.retrieved, k);
    totals.ndcgAtK += computeNDCGAtK(relevant, sample.retrieved, k);
  }
  const n = samples.length;
  const mean = (total: number) => (n === 0 ? 0 : total / n);
  return {
    mrr: mean(totals.mrr),
    recallAtK: mean(totals.recallAtK),
    ndcgAtK: mean(totals.ndcgAtK),
    sampleCount: n,
    k,
  };
}

export interface LabeledQuery {
  query: string;
  /** Relevant record ids, or urls when evaluating with matchOn: 'url'. */
  relevant: string[];
}

export interface QueryEvaluation {
  query: string;
  recallAtK: number;
  hits: number;
  relevantCount: number;
  /** Retrieved keys (id or url) in rank order. */
  retrieved: string[];
  scoring: string;
}

export interface RecommenderEvaluation extends RetrievalEvalResult {
  meanRecallAtK: number;
  meanCategoryDiversity: number;
  perQuery: QueryEvaluation[];
}

/**
 * Runs each labeled query through `recommender` (sequentially, so results do
 * not depend on scheduling) and scores the output.
 */
export async function evaluateRecommender(
  recommender: Recommender,
  labeled: LabeledQuery[],
  options: { k?: number; matchOn?: 'id' | 'url' } = {},
): Promise<RecommenderEvaluation> {
  const k = options.k ?? DEFAULT_K;
  const keyOf = options.matchOn === 'url' ? (r: CatalogRecord) => r.url : (r: CatalogRecord) => r.id;

  const samples: RetrievalEvalSample[] = [];
  const perQuery: QueryEvaluation[] = [];
  let diversitySum = 0;

  for (const item of labeled) {
    const result = await recommender.recommend(item.query, k);
    const retrieved = result.records.map(keyOf);
    const relevant = new Set(item.relevant);
    const recallAtK = computeRecallAtK(relevant, retrieved.map((id) => ({ id })), k);
    const hits = new Set(retrieved.slice(0, k).filter((id) => relevant.has(id))).size;

    samples.push({ query: item.query, relevantIds: item.relevant, retrieved: retrieved.map((id) => ({ id })) });
    perQuery.push({
      query: item.query,
      recallAtK,
      hits,
      relevantCount: relevant.size,
      retrieved,
      scoring: result.scoring,
    });
    diversitySum += computeCategoryDiversity(result.records);
    logger.debug('eval:query', { query: item.query.slice(0, 50), recallAtK });
  }

  const aggregate = runRetrievalEval(samples, k);
  return {
    ...aggregate,
    meanRecallAtK: aggregate.recallAtK,
    meanCategoryDiversity: labeled.length === 0 ? 0 : diversitySum / labeled.length,
    perQuery,
  };
}
