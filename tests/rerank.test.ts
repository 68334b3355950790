import { describe, it, expect, vi } from 'vitest';
import { LlmReranker, assertPermutation } from '@/services/rerank';
import type { LlmCallOptions, LlmClient } from '@/services/llm-client';
import { RerankUnavailable } from '@/errors/recommendation-errors';
import { JAVA, PYTHON, TEAMWORK, makeRecord } from './helpers';

function clientReturning(raw: string): LlmClient & { calls: Array<{ prompt: string; options?: LlmCallOptions }> } {
  const calls: Array<{ prompt: string; options?: LlmCallOptions }> = [];
  return {
    calls,
    async call(_system: string, prompt: string, options?: LlmCallOptions) {
      calls.push({ prompt, options });
      return raw;
    },
  };
}

const candidates = [JAVA, TEAMWORK, PYTHON];

describe('LlmReranker', () => {
  it('applies the ranking returned by the model', async () => {
    const reranker = new LlmReranker(clientReturning('{"ranking":[2,0,1]}'));
    const out = await reranker.rerank('python developer', candidates);
    expect(out.map((r) => r.id)).toEqual(['python-programming', 'java-programming', 'teamwork-profile']);
  });

  it('reads rankings wrapped in a markdown fence', async () => {
    const reranker = new LlmReranker(clientReturning('```json\n{"ranking":[1,0,2]}\n```'));
    const out = await reranker.rerank('teamwork', candidates);
    expect(out.map((r) => r.id)).toEqual(['teamwork-profile', 'java-programming', 'python-programming']);
  });

  it('sends the query and passes the signal through', async () => {
    const client = clientReturning('{"ranking":[0,1,2]}');
    const controller = new AbortController();
    await new LlmReranker(client, 128).rerank('java lead', candidates, { signal: controller.signal });

    expect(client.calls).toHaveLength(1);
    expect(client.calls[0].prompt).toContain('Hiring need / query: "java lead"');
    expect(client.calls[0].prompt).toContain(`"id": 1,\n    "name": "${TEAMWORK.name}"`);
    expect(client.calls[0].options).toEqual({ task: 'rerank', maxTokens: 128, signal: controller.signal });
  });

  it.each([
    ['a missing item', '{"ranking":[0,1]}'],
    ['a repeated item', '{"ranking":[0,0,1]}'],
    ['a position past the end', '{"ranking":[0,1,3]}'],
    ['a negative position', '{"ranking":[-1,0,1]}'],
    ['record ids instead of positions', '{"ranking":["java-programming","teamwork-profile","python-programming"]}'],
    ['malformed output', 'not json at all'],
    ['the wrong shape', '{"order":["java-programming"]}'],
  ])('rejects %s', async (_label, raw) => {
    const reranker = new LlmReranker(clientReturning(raw));
    await expect(reranker.rerank('java', candidates)).rejects.toBeInstanceOf(RerankUnavailable);
  });

  it('wraps transport failures', async () => {
    const client: LlmClient = { call: vi.fn().mockRejectedValue(new Error('socket hang up')) };
    await expect(new LlmReranker(client).rerank('java', candidates)).rejects.toMatchObject({
      code: 'rerank_unavailable',
      message: 'Reranking service call failed',
    });
  });

  it('does not call the model for a single candidate', async () => {
    const client = clientReturning('{"ranking":[0]}');
    const out = await new LlmReranker(client).rerank('java', [JAVA]);
    expect(out).toEqual([JAVA]);
    expect(client.calls).toHaveLength(0);
  });

  it('keeps url record ids out of the prompt and maps positions back to them', async () => {
    const crawled = Array.from({ length: 10 }, (_, i) => {
      const url = `https://assessments.example.com/catalog/view/assessment-number-${i}-new/`;
      return makeRecord(url, ['Knowledge & Skills'], { name: `Assessment ${i}`, url });
    });
    const client = clientReturning('{"ranking":[9,8,7,6,5,4,3,2,1,0]}');
    const out = await new LlmReranker(client).rerank('backend engineer', crawled);

    expect(out.map((r) => r.id)).toEqual([...crawled].reverse().map((r) => r.id));
    expect(client.calls[0].prompt).toContain('"id": 9,');
    expect(client.calls[0].prompt).not.toContain('https://');
  });
});

describe('assertPermutation', () => {
  it('accepts any reordering of the same records', () => {
    expect(() => assertPermutation(candidates, [PYTHON, JAVA, TEAMWORK])).not.toThrow();
  });

  it('rejects substitutions', () => {
    expect(() => assertPermutation([JAVA, TEAMWORK], [JAVA, PYTHON])).toThrow(RerankUnavailable);
  });

  it('rejects length changes', () => {
    expect(() => assertPermutation([JAVA, TEAMWORK], [JAVA])).toThrow(RerankUnavailable);
  });
});
