// src/services/rerank.ts: LLM reranking of a balanced shortlist.
// The model only reorders: output must be a permutation of the input or it is rejected.

import { z } from 'zod';
import type { CatalogRecord } from '@/types/catalog';
import { RerankUnavailable } from '@/errors/recommendation-errors';
import type { LlmClient } from '@/services/llm-client';
import { safeParseJson } from '@/services/safe-parse-json';

export interface RerankOptions {
  signal?: AbortSignal;
}

export interface Reranker {
  readonly name: string;
  rerank(query: string, candidates: readonly CatalogRecord[], options?: RerankOptions): Promise<CatalogRecord[]>;
}

/** Throws RerankUnavailable unless `output` holds exactly the records of `input`. */
export function assertPermutation(input: readonly CatalogRecord[], output: readonly CatalogRecord[]): void {
  if (output.length !== input.length) {
    throw new RerankUnavailable(`Reranker returned ${output.length} items for ${input.length}`, {
      expected: input.length,
      actual: output.length,
    });
  }
  const remaining = new Map<string, number>();
  for (const r of input) remaining.set(r.id, (remaining.get(r.id) ?? 0) + 1);
  for (const r of output) {
    const left = remaining.get(r.id) ?? 0;
    if (left === 0) {
      throw new RerankUnavailable(`Reranker returned unexpected or duplicate item "${r.id}"`, { id: r.id });
    }
    remaining.set(r.id, left - 1);
  }
}

const rankingSchema = z.object({
  ranking: z.array(z.number().int()),
});

const SYSTEM_PROMPT = 'You are a ranking model that outputs compact JSON only.';

function buildPrompt(query: string, candidates: readonly CatalogRecord[]): string {
  // Items are addressed by position; record ids can be long urls.
  const payload = candidates.map((c, index) => ({
    id: index,
    name: c.name,
    type: c.categories.join(', '),
    description: c.description.slice(0, 300),
  }));

  return `
You are an expert HR assessment consultant reordering assessment recommendations.

Hiring need / query: "${query}"

Order ALL items from most to least relevant. Consider the technical skills,
cognitive abilities and behavioural traits the query asks for. When the query
needs several kinds of skills, keep a balanced mix near the top.

Return JSON only in the format:
{ "ranking": [0, 3, 1, ...] }
Use the numeric id of each item. Every id must appear exactly once.

Items:
${JSON.stringify(payload, null, 2)}
`;
}

/**
 * Reranker backed by a chat model. Any failure, including output that is not
 * a permutation of the candidates, surfaces as RerankUnavailable.
 */
export class LlmReranker implements Reranker {
  readonly name = 'llm';

  constructor(
    private readonly client: LlmClient,
    private readonly maxTokens = 256,
  ) {}

  async rerank(
    query: string,
    candidates: readonly CatalogRecord[],
    options: RerankOptions = {},
  ): Promise<CatalogRecord[]> {
    if (candidates.length <= 1) return [...candidates];

    let raw: string;
    try {
      raw = await this.client.call(SYSTEM_PROMPT, buildPrompt(query, candidates), {
        task: 'rerank',
        maxTokens: this.maxTokens,
        signal: options.signal,
      });
    } catch (err) {
      if (options.signal?.aborted) throw err;
      throw new RerankUnavailable('Reranking service call failed', {}, { cause: err });
    }

    const parsed = rankingSchema.safeParse(safeParseJson(raw, 'rerank'));
    if (!parsed.success) {
      throw new RerankUnavailable('Reranking service returned malformed output', {
        raw: raw.slice(0, 200),
      });
    }

    const ordered: CatalogRecord[] = [];
    for (const position of parsed.data.ranking) {
      const record = position >= 0 && position < candidates.length ? candidates[position] : undefined;
      if (!record) {
        throw new RerankUnavailable(`Reranking service returned unknown position ${position}`, { position });
      }
      ordered.push(record);
    }
    assertPermutation(candidates, ordered);
    return ordered;
  }
}
