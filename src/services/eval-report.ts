// src/services/eval-report.ts: labeled-set loading, predictions CSV and the text report for evaluate.ts
import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { LabeledQuery, RecommenderEvaluation } from '@/services/eval-retrieval';
import type { Recommender } from '@/services/recommendation-engine';

const labeledFileSchema = z.array(
  z.object({
    query: z.string().min(1),
    relevant: z.array(z.string().min(1)),
  }),
);

export async function loadLabeledQueries(filePath: string): Promise<LabeledQuery[]> {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
  const parsed = labeledFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid labeled query file ${filePath}: ${details}`);
  }
  return parsed.data;
}

function csvField(value: string): string {
  return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** One `query,assessment_url` row per recommended record. */
export async function buildPredictionsCsv(recommender: Recommender, queries: string[], k: number): Promise<string> {
  const lines = ['query,assessment_url'];
  for (const query of queries) {
    const result = await recommender.recommend(query, k);
    for (const record of result.records) {
      lines.push(`${csvField(query)},${csvField(record.url)}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

export function formatReport(evaluation: RecommenderEvaluation): string {
  const pct = (n: number) => `${(n * 100).toFixed(1)}%`;
  const rows = evaluation.perQuery.map(
    (q) => `  ${pct(q.recallAtK).padStart(6)}  ${q.hits}/${q.relevantCount}  [${q.scoring}]  ${q.query.slice(0, 70)}`,
  );
  return [
    `Queries evaluated: ${evaluation.sampleCount}`,
    `Mean Recall@${evaluation.k}: ${evaluation.meanRecallAtK.toFixed(4)}`,
    `MRR: ${evaluation.mrr.toFixed(4)}`,
    `NDCG@${evaluation.k}: ${evaluation.ndcgAtK.toFixed(4)}`,
    `Mean category diversity: ${evaluation.meanCategoryDiversity.toFixed(4)}`,
    '',
    'Per query:',
    ...rows,
  ].join('\n');
}
