import { describe, it, expect } from 'vitest';
import { loadAppConfig } from '@/config/app.config';

describe('loadAppConfig', () => {
  it('applies defaults', () => {
    const config = loadAppConfig({});

    expect(config.port).toBe(4000);
    expect(config.catalogPath).toBe('data/catalog.json');
    expect(config.embedding).toEqual({
      provider: 'hashing',
      model: 'text-embedding-3-small',
      dimension: undefined,
      timeoutMs: 2000,
      healthProbeTtlMs: 5000,
    });
    expect(config.rerank.enabled).toBe(false);
    expect(config.recommendation).toEqual({
      maxQueryLength: 2000,
      defaultResults: 10,
      maxResults: 10,
      overfetchFactor: 3,
      diversityMinScore: 0,
    });
    expect(config.corsOrigins).toEqual(['http://localhost:3000']);
  });

  it('selects the hosted provider when an API key is present', () => {
    const config = loadAppConfig({ OPENAI_API_KEY: 'test-secret', RERANK_ENABLED: 'true' });
    expect(config.embedding.provider).toBe('openai');
    expect(config.rerank.enabled).toBe(true);
    expect(config.openaiApiKey).toBe('test-secret');
  });

  it('treats empty values as unset', () => {
    const config = loadAppConfig({ PORT: '', CORS_ORIGIN: '  ' });
    expect(config.port).toBe(4000);
    expect(config.corsOrigins).toEqual(['http://localhost:3000']);
  });

  it('splits CORS origins', () => {
    const config = loadAppConfig({ CORS_ORIGIN: 'http://a.test, http://b.test' });
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('coerces numeric settings', () => {
    const config = loadAppConfig({ PORT: '8080', MAX_RESULTS: '5', DEFAULT_RESULTS: '3', EMBEDDING_DIMENSION: '128' });
    expect(config.port).toBe(8080);
    expect(config.recommendation.maxResults).toBe(5);
    expect(config.recommendation.defaultResults).toBe(3);
    expect(config.embedding.dimension).toBe(128);
  });

  it.each([
    [{ MAX_RESULTS: '11' }, /MAX_RESULTS/],
    [{ PORT: 'abc' }, /PORT/],
    [{ DEFAULT_RESULTS: '8', MAX_RESULTS: '5' }, /DEFAULT_RESULTS \(8\) exceeds MAX_RESULTS \(5\)/],
    [{ EMBEDDING_PROVIDER: 'openai' }, /EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY/],
    [{ RERANK_ENABLED: 'true' }, /RERANK_ENABLED requires OPENAI_API_KEY/],
    [{ OVERFETCH_FACTOR: '2' }, /OVERFETCH_FACTOR/],
  ])('rejects %o', (env, message) => {
    expect(() => loadAppConfig(env)).toThrow(message);
  });
});
