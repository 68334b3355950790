import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
  computeCategoryDiversity,
  computeMRR,
  computeNDCGAtK,
  computeRecallAtK,
  evaluateRecommender,
  runRetrievalEval,
} from '@/services/eval-retrieval';
import { buildPredictionsCsv, formatReport, loadLabeledQueries } from '@/services/eval-report';
import type { Recommender } from '@/services/recommendation-engine';
import type { CatalogRecord } from '@/types/catalog';
import { JAVA, PYTHON, TEAMWORK, makeRecord } from './helpers';

const asRetrieved = (ids: string[]) => ids.map((id) => ({ id }));

describe('computeRecallAtK', () => {
  it('is 1 when every relevant item is retrieved', () => {
    expect(computeRecallAtK(new Set(['a', 'b', 'c']), asRetrieved(['c', 'a', 'b']), 3)).toBe(1);
  });

  it('is the fraction of relevant items retrieved', () => {
    expect(computeRecallAtK(new Set(['a', 'b', 'c']), asRetrieved(['a', 'x', 'y']), 3)).toBeCloseTo(1 / 3, 10);
  });

  it('only looks at the top k', () => {
    expect(computeRecallAtK(new Set(['a', 'b']), asRetrieved(['x', 'a', 'b']), 2)).toBe(0.5);
  });

  it('counts repeated hits once', () => {
    expect(computeRecallAtK(new Set(['a', 'b', 'c']), asRetrieved(['a', 'a', 'a']), 3)).toBeCloseTo(1 / 3, 10);
  });

  it('is 0 when nothing is relevant', () => {
    expect(computeRecallAtK(new Set(), asRetrieved(['a']), 3)).toBe(0);
  });
});

describe('ranking metrics', () => {
  it('computes MRR from the first relevant hit', () => {
    expect(computeMRR(new Set(['b']), asRetrieved(['a', 'b']))).toBe(0.5);
    expect(computeMRR(new Set(['z']), asRetrieved(['a', 'b']))).toBe(0);
  });

  it('computes NDCG with binary relevance', () => {
    expect(computeNDCGAtK(new Set(['a']), asRetrieved(['a', 'x']), 2)).toBe(1);
    expect(computeNDCGAtK(new Set(['a']), asRetrieved(['x', 'a']), 2)).toBeCloseTo(1 / Math.log2(3), 10);
  });

  it('measures category diversity', () => {
    expect(computeCategoryDiversity([JAVA, TEAMWORK, PYTHON])).toBeCloseTo(2 / 3, 10);
    expect(computeCategoryDiversity([])).toBe(0);
  });

  it('averages over samples', () => {
    const result = runRetrievalEval(
      [
        { relevantIds: ['a'], retrieved: asRetrieved(['a']) },
        { relevantIds: ['b'], retrieved: asRetrieved(['x']) },
      ],
      1,
    );
    expect(result).toEqual({ mrr: 0.5, recallAtK: 0.5, ndcgAtK: 0.5, sampleCount: 2, k: 1 });
  });

  it('reports zeros for an empty sample set', () => {
    expect(runRetrievalEval([], 5)).toEqual({ mrr: 0, recallAtK: 0, ndcgAtK: 0, sampleCount: 0, k: 5 });
  });
});

function fixedRecommender(answers: Record<string, CatalogRecord[]>): Recommender {
  return {
    recommend: async (query: string, k?: number) => ({
      records: (answers[query] ?? []).slice(0, k),
      scoring: 'vector',
      reranked: false,
    }),
  };
}

describe('evaluateRecommender', () => {
  const recommender = fixedRecommender({
    'java role': [JAVA, TEAMWORK, PYTHON],
    'data role': [PYTHON, makeRecord('sql', ['Knowledge & Skills']), makeRecord('excel', ['Simulations'])],
  });

  it('scores each labeled query and the mean', async () => {
    const evaluation = await evaluateRecommender(
      recommender,
      [
        { query: 'java role', relevant: ['java-programming', 'teamwork-profile', 'python-programming'] },
        { query: 'data role', relevant: ['python-programming', 'numeracy', 'spreadsheets'] },
      ],
      { k: 3 },
    );

    expect(evaluation.perQuery.map((q) => q.recallAtK)).toEqual([1, 1 / 3]);
    expect(evaluation.perQuery[1].hits).toBe(1);
    expect(evaluation.meanRecallAtK).toBeCloseTo(2 / 3, 10);
    expect(evaluation.sampleCount).toBe(2);
    expect(evaluation.meanCategoryDiversity).toBeCloseTo(2 / 3, 10);
  });

  it('matches on urls when asked', async () => {
    const evaluation = await evaluateRecommender(
      recommender,
      [{ query: 'java role', relevant: [JAVA.url] }],
      { k: 3, matchOn: 'url' },
    );
    expect(evaluation.meanRecallAtK).toBe(1);
    expect(evaluation.perQuery[0].retrieved[0]).toBe(JAVA.url);
  });

  it('formats a report', async () => {
    const evaluation = await evaluateRecommender(recommender, [{ query: 'java role', relevant: ['java-programming'] }], {
      k: 3,
    });
    const report = formatReport(evaluation).split('\n');
    expect(report[0]).toBe('Queries evaluated: 1');
    expect(report[1]).toBe('Mean Recall@3: 1.0000');
    expect(report[2]).toBe('MRR: 1.0000');
    expect(report[7]).toBe('  100.0%  1/1  [vector]  java role');
  });

  it('writes one predictions row per recommended record', async () => {
    const csvRecommender = fixedRecommender({ 'java role': [JAVA, TEAMWORK, PYTHON], 'data, senior': [PYTHON] });
    const csv = await buildPredictionsCsv(csvRecommender, ['java role', 'data, senior', 'unknown'], 2);
    expect(csv).toBe(
      [
        'query,assessment_url',
        `java role,${JAVA.url}`,
        `java role,${TEAMWORK.url}`,
        `"data, senior",${PYTHON.url}`,
        '',
      ].join('\n'),
    );
  });
});

describe('loadLabeledQueries', () => {
  it('reads the bundled labeled set', async () => {
    const labeled = await loadLabeledQueries(fileURLToPath(new URL('../data/labeled-queries.json', import.meta.url)));
    expect(labeled).toHaveLength(5);
    expect(labeled[0].relevant).toHaveLength(3);
  });
});
