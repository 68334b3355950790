// src/services/providers/retrieval-vector-utils.ts: vector math and tokenization shared by the index and the lexical fallback

import type { Embedding } from '@/types/catalog';

export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface Embedder {
  /** Provider label used in logs and the embedding store. */
  readonly id: string;
  /** Fixed vector length D produced by this embedder. */
  readonly dimension: number;
  embed(text: string, options?: EmbedOptions): Promise<Embedding>;
  embedBatch(texts: string[], options?: EmbedOptions): Promise<Embedding[]>;
}

export function vectorNorm(v: Embedding): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

/** Unit-length copy of `v`, or null for a zero vector. */
export function normalizeVector(v: Embedding): Float64Array | null {
  const norm = vectorNorm(v);
  if (norm === 0 || !Number.isFinite(norm)) return null;
  const out = new Float64Array(v.length);
  for (let i = 0; i < v.length; i++) out[i] = v[i] / norm;
  return out;
}

export function dotProduct(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += a[i] * b[i];
  return dot;
}

export function isFiniteVector(v: Embedding): boolean {
  return v.every((x) => Number.isFinite(x));
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter(Boolean);
}

/** Number of distinct terms present in both token lists. */
export function sharedTermCount(queryTokens: string[], docTokens: string[]): number {
  if (queryTokens.length === 0 || docTokens.length === 0) return 0;
  const doc = new Set(docTokens);
  let shared = 0;
  for (const t of new Set(queryTokens)) {
    if (doc.has(t)) shared++;
  }
  return shared;
}
