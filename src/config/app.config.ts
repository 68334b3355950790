/** App configuration, validated from the environment. */
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  CATALOG_PATH: z.string().min(1).default('data/catalog.json'),
  EMBEDDINGS_CACHE_PATH: z.string().min(1).optional(),

  EMBEDDING_PROVIDER: z.enum(['openai', 'hashing']).optional(),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().optional(),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  HEALTH_PROBE_TTL_MS: z.coerce.number().int().min(0).default(5000),

  RERANK_ENABLED: booleanFlag.default('false'),
  RERANK_MODEL: z.string().min(1).default('gpt-4o-mini'),
  RERANK_TIMEOUT_MS: z.coerce.number().int().positive().default(4000),

  OPENAI_API_KEY: z.string().min(1).optional(),

  MAX_QUERY_LENGTH: z.coerce.number().int().positive().default(2000),
  DEFAULT_RESULTS: z.coerce.number().int().min(1).max(10).default(10),
  MAX_RESULTS: z.coerce.number().int().min(1).max(10).default(10),
  OVERFETCH_FACTOR: z.coerce.number().int().min(3).default(3),
  DIVERSITY_MIN_SCORE: z.coerce.number().default(0),

  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  CORS_ORIGIN: z.string().optional(),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(100),
});

export type EmbeddingProviderKind = 'openai' | 'hashing';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  catalogPath: string;
  embeddingsCachePath?: string;
  embedding: {
    provider: EmbeddingProviderKind;
    model: string;
    dimension?: number;
    timeoutMs: number;
    /** How long a /health embedding probe result is reused. */
    healthProbeTtlMs: number;
  };
  rerank: {
    enabled: boolean;
    model: string;
    timeoutMs: number;
  };
  openaiApiKey?: string;
  recommendation: {
    maxQueryLength: number;
    defaultResults: number;
    maxResults: number;
    overfetchFactor: number;
    diversityMinScore: number;
  };
  requestTimeoutMs: number;
  corsOrigins: string[];
  rateLimitPerMinute: number;
}

/**
 * Parses the environment into an AppConfig. Throws when a value is invalid;
 * startup should not continue on a broken configuration.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings from .env files count as unset.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join('.') || 'env'}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const parsed = result.data;

  if (parsed.DEFAULT_RESULTS > parsed.MAX_RESULTS) {
    throw new Error(
      `Invalid configuration: DEFAULT_RESULTS (${parsed.DEFAULT_RESULTS}) exceeds MAX_RESULTS (${parsed.MAX_RESULTS})`,
    );
  }

  const provider: EmbeddingProviderKind =
    parsed.EMBEDDING_PROVIDER ?? (parsed.OPENAI_API_KEY ? 'openai' : 'hashing');
  if (provider === 'openai' && !parsed.OPENAI_API_KEY) {
    throw new Error('Invalid configuration: EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY');
  }
  if (parsed.RERANK_ENABLED && !parsed.OPENAI_API_KEY) {
    throw new Error('Invalid configuration: RERANK_ENABLED requires OPENAI_API_KEY');
  }

  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    catalogPath: parsed.CATALOG_PATH,
    embeddingsCachePath: parsed.EMBEDDINGS_CACHE_PATH,
    embedding: {
      provider,
      model: parsed.EMBEDDING_MODEL,
      dimension: parsed.EMBEDDING_DIMENSION,
      timeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
      healthProbeTtlMs: parsed.HEALTH_PROBE_TTL_MS,
    },
    rerank: {
      enabled: parsed.RERANK_ENABLED,
      model: parsed.RERANK_MODEL,
      timeoutMs: parsed.RERANK_TIMEOUT_MS,
    },
    openaiApiKey: parsed.OPENAI_API_KEY,
    recommendation: {
      maxQueryLength: parsed.MAX_QUERY_LENGTH,
      defaultResults: parsed.DEFAULT_RESULTS,
      maxResults: parsed.MAX_RESULTS,
      overfetchFactor: parsed.OVERFETCH_FACTOR,
      diversityMinScore: parsed.DIVERSITY_MIN_SCORE,
    },
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    corsOrigins: parsed.CORS_ORIGIN
      ? parsed.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean)
      : ['http://localhost:3000'],
    rateLimitPerMinute: parsed.RATE_LIMIT_PER_MINUTE,
  };
}
