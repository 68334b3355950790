/**
 * OpenAI embeddings behind the Embedder interface.
 * Batches catalog texts and forwards the caller's AbortSignal to the HTTP request.
 */

import OpenAI from 'openai';
import type { Embedding } from '@/types/catalog';
import type { Embedder, EmbedOptions } from '../retrieval-vector-utils';

/** The slice of the OpenAI client this embedder calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: OpenAI.EmbeddingCreateParams,
      options?: { signal?: AbortSignal },
    ): Promise<{ data: Array<{ index: number; embedding: number[] }> }>;
  };
}

export interface OpenAIEmbedderConfig {
  apiKey: string;
  /** e.g. 'text-embedding-3-small', 'text-embedding-3-large' */
  model?: string;
  /** Requested vector length; the model's native size when omitted. */
  dimensions?: number;
  batchSize?: number;
  /** Injected for tests; built from apiKey otherwise. */
  client?: EmbeddingsClient;
}

const NATIVE_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

export class OpenAIEmbedder implements Embedder {
  readonly id: string;
  readonly dimension: number;
  private readonly model: string;
  private readonly requestedDimensions?: number;
  private readonly batchSize: number;
  private readonly client: EmbeddingsClient;

  constructor(config: OpenAIEmbedderConfig) {
    this.model = config.model || 'text-embedding-3-small';
    const dimension = config.dimensions ?? NATIVE_DIMENSIONS[this.model];
    if (!dimension) {
      throw new Error(
        `Unknown embedding size for model "${this.model}". Set EMBEDDING_DIMENSION explicitly.`,
      );
    }
    this.dimension = dimension;
    this.requestedDimensions = config.dimensions;
    this.batchSize = config.batchSize ?? 96;
    this.id = `openai:${this.model}:${dimension}`;
    this.client = config.client ?? new OpenAI({ apiKey: config.apiKey, maxRetries: 1 });
  }

  async embed(text: string, options?: EmbedOptions): Promise<Embedding> {
    const [vector] = await this.embedBatch([text], options);
    if (!vector) throw new Error('OpenAI returned no embedding');
    return vector;
  }

  async embedBatch(texts: string[], options?: EmbedOptions): Promise<Embedding[]> {
    if (texts.length === 0) return [];

    const out: Embedding[] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const res = await this.client.embeddings.create(
        {
          model: this.model,
          // The API rejects empty strings.
          input: batch.map((t) => (t.trim() ? t : ' ')),
          ...(this.requestedDimensions ? { dimensions: this.requestedDimensions } : {}),
        },
        { signal: options?.signal },
      );
      const ordered = [...res.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        throw new Error(`OpenAI returned ${ordered.length} embeddings for ${batch.length} inputs`);
      }
      for (const item of ordered) out.push(item.embedding);
    }
    return out;
  }
}
