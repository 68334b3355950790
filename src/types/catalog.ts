// Core catalog and ranking types shared by the index, balancer, reranker and engine.

export const ASSESSMENT_CATEGORIES = [
  'Ability & Aptitude',
  'Knowledge & Skills',
  'Personality & Behavior',
  'Simulations',
  'Other',
] as const;

export type AssessmentCategory = (typeof ASSESSMENT_CATEGORIES)[number];

export interface CatalogRecord {
  readonly id: string;
  readonly name: string;
  readonly url: string;
  readonly description: string;
  /** Non-empty; the first entry is the primary category. */
  readonly categories: readonly AssessmentCategory[];
  /** Null when the source does not state a duration. */
  readonly durationMinutes: number | null;
  readonly adaptiveSupport: boolean;
  readonly remoteSupport: boolean;
}

export type Embedding = number[];

/** Cosine similarity between the query vector and a record vector. */
export interface VectorScore {
  kind: 'vector';
  similarity: number;
}

/** Fallback signal: distinct terms shared by query and record text. Lower confidence than VectorScore. */
export interface LexicalScore {
  kind: 'lexical';
  sharedTerms: number;
}

export type CandidateScore = VectorScore | LexicalScore;

export type ScoringStrategy = CandidateScore['kind'];

export interface RankedCandidate {
  record: CatalogRecord;
  /** 0-based position in the ranked list that produced this candidate. */
  rank: number;
  score: CandidateScore;
}

export interface RecommendationResult {
  records: CatalogRecord[];
  scoring: ScoringStrategy;
  /** True when the reasoning service supplied the final order. */
  reranked: boolean;
}

export function primaryCategory(record: CatalogRecord): AssessmentCategory {
  return record.categories[0] ?? 'Other';
}

/** Numeric value of a score, comparable only within one strategy. */
export function scoreValue(score: CandidateScore): number {
  return score.kind === 'vector' ? score.similarity : score.sharedTerms;
}
