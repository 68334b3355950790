// src/services/pipeline-deps.ts: wires the recommendation pipeline from AppConfig for the HTTP server and scripts
import type { AppConfig } from '@/config/app.config';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import { SimpleEmbedder } from '@/services/providers/embedding/simple-embedder';
import { OpenAIEmbedder } from '@/services/providers/embedding/openai-embedder';
import { JsonCatalogProvider } from '@/services/providers/catalog/json-catalog';
import type { CatalogProvider } from '@/services/providers/catalog/catalog-provider';
import { CatalogIndexHolder } from '@/services/catalog-index';
import { LlmReranker, type Reranker } from '@/services/rerank';
import { ProviderLlmClient } from '@/services/llm-client';
import { RecommendationEngine } from '@/services/recommendation-engine';

export interface PipelineDeps {
  engine: RecommendationEngine;
  holder: CatalogIndexHolder;
  embedder: Embedder;
  reranker: Reranker | null;
  catalogProvider: CatalogProvider;
}

export function createEmbedder(config: AppConfig): Embedder {
  if (config.embedding.provider === 'openai' && config.openaiApiKey) {
    return new OpenAIEmbedder({
      apiKey: config.openaiApiKey,
      model: config.embedding.model,
      dimensions: config.embedding.dimension,
    });
  }
  return new SimpleEmbedder(config.embedding.dimension ?? 256);
}

export function createReranker(config: AppConfig): Reranker | null {
  if (!config.rerank.enabled || !config.openaiApiKey) return null;
  return new LlmReranker(new ProviderLlmClient({ apiKey: config.openaiApiKey, model: config.rerank.model }));
}

/** Builds the engine with an empty holder; call `engine.reload()` to load the catalog. */
export function createPipelineDeps(config: AppConfig): PipelineDeps {
  const holder = new CatalogIndexHolder();
  const embedder = createEmbedder(config);
  const reranker = createReranker(config);
  const catalogProvider = new JsonCatalogProvider(config.catalogPath);

  const engine = new RecommendationEngine({
    holder,
    embedder,
    reranker,
    catalogProvider,
    embeddingsCachePath: config.embeddingsCachePath,
    options: {
      maxQueryLength: config.recommendation.maxQueryLength,
      defaultResults: config.recommendation.defaultResults,
      maxResults: config.recommendation.maxResults,
      overfetchFactor: config.recommendation.overfetchFactor,
      diversityMinScore: config.recommendation.diversityMinScore,
      embeddingTimeoutMs: config.embedding.timeoutMs,
      healthProbeTtlMs: config.embedding.healthProbeTtlMs,
      rerankTimeoutMs: config.rerank.timeoutMs,
    },
  });

  return { engine, holder, embedder, reranker, catalogProvider };
}
