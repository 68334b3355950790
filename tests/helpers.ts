// Shared fixtures for the test suite: catalog records and in-process embedders.
import type { AssessmentCategory, CatalogRecord, Embedding } from '@/types/catalog';
import type { Embedder, EmbedOptions } from '@/services/providers/retrieval-vector-utils';
import { tokenize } from '@/services/providers/retrieval-vector-utils';

export function makeRecord(
  id: string,
  categories: AssessmentCategory[],
  overrides: Partial<Omit<CatalogRecord, 'id' | 'categories'>> = {},
): CatalogRecord {
  return {
    id,
    name: overrides.name ?? id,
    url: overrides.url ?? `https://assessments.example.com/catalog/${id}/`,
    description: overrides.description ?? '',
    categories,
    durationMinutes: overrides.durationMinutes ?? null,
    adaptiveSupport: overrides.adaptiveSupport ?? false,
    remoteSupport: overrides.remoteSupport ?? true,
  };
}

/**
 * One axis per vocabulary term plus a constant bias axis, so every text maps
 * to a non-zero vector and similarity tracks shared vocabulary terms.
 */
export class KeywordEmbedder implements Embedder {
  readonly id: string;
  readonly dimension: number;
  readonly queries: string[] = [];
  batchCalls = 0;
  failQueries = false;

  constructor(private readonly vocabulary: string[], id = 'keyword') {
    this.dimension = vocabulary.length + 1;
    this.id = id;
  }

  vectorFor(text: string): Embedding {
    const tokens = new Set(tokenize(text));
    const vec: number[] = this.vocabulary.map((term) => (tokens.has(term) ? 1 : 0));
    vec.push(0.1);
    return vec;
  }

  async embed(text: string, options?: EmbedOptions): Promise<Embedding> {
    options?.signal?.throwIfAborted();
    this.queries.push(text);
    if (this.failQueries) throw new Error('embedding service unreachable');
    return this.vectorFor(text);
  }

  async embedBatch(texts: string[], options?: EmbedOptions): Promise<Embedding[]> {
    options?.signal?.throwIfAborted();
    this.batchCalls++;
    return texts.map((t) => this.vectorFor(t));
  }
}

/** Embedder whose every call fails, as when the provider is unreachable. */
export class UnreachableEmbedder implements Embedder {
  readonly id = 'unreachable';
  readonly dimension = 4;

  async embed(): Promise<Embedding> {
    throw new Error('connect ECONNREFUSED');
  }

  async embedBatch(): Promise<Embedding[]> {
    throw new Error('connect ECONNREFUSED');
  }
}

/** Resolves when `signal` aborts, rejecting with its reason. */
export function untilAborted<T>(signal: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export const JAVA = makeRecord('java-programming', ['Knowledge & Skills'], {
  name: 'Java Programming',
  description: 'Core java language test',
});
export const TEAMWORK = makeRecord('teamwork-profile', ['Personality & Behavior'], {
  name: 'Teamwork Profile',
  description: 'Measures communication and teamwork',
});
export const PYTHON = makeRecord('python-programming', ['Knowledge & Skills'], {
  name: 'Python Programming',
  description: 'Core python language test',
});

export const EXAMPLE_VOCABULARY = ['java', 'python', 'communication', 'teamwork'];
