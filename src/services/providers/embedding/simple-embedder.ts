// src/services/providers/embedding/simple-embedder.ts
// Local deterministic embedder (feature hashing over word tokens). Used when no
// embedding API key is configured.

import type { Embedding } from '@/types/catalog';
import { tokenize, type Embedder, type EmbedOptions } from '../retrieval-vector-utils';

export class SimpleEmbedder implements Embedder {
  readonly id: string;
  readonly dimension: number;

  constructor(dim = 256) {
    if (!Number.isInteger(dim) || dim <= 0) {
      throw new Error(`SimpleEmbedder dimension must be a positive integer, got ${dim}`);
    }
    this.dimension = dim;
    this.id = `hashing-${dim}`;
  }

  async embed(text: string, options?: EmbedOptions): Promise<Embedding> {
    options?.signal?.throwIfAborted();
    const vec: number[] = new Array(this.dimension).fill(0);

    for (const token of tokenize(text)) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vec[hash % this.dimension] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }

  async embedBatch(texts: string[], options?: EmbedOptions): Promise<Embedding[]> {
    return Promise.all(texts.map((t) => this.embed(t, options)));
  }
}
