// src/scripts/evaluate.ts: offline evaluation over a labeled query set.
// Usage: tsx src/scripts/evaluate.ts --labeled data/labeled-queries.json [--k 10] [--match-on url|id] [--predictions out.csv]
import 'dotenv/config';
import { writeFile } from 'fs/promises';
import { parseArgs } from 'util';

import { loadAppConfig } from '@/config/app.config';
import { createPipelineDeps } from '@/services/pipeline-deps';
import { evaluateRecommender } from '@/services/eval-retrieval';
import { buildPredictionsCsv, formatReport, loadLabeledQueries } from '@/services/eval-report';
import { errorMessage } from '@/errors/recommendation-errors';
import { logger, setLogLevel } from '@/services/logger';

function isMatchOn(value: string): value is 'id' | 'url' {
  return value === 'id' || value === 'url';
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      labeled: { type: 'string' },
      k: { type: 'string' },
      'match-on': { type: 'string' },
      predictions: { type: 'string' },
    },
  });

  const labeledPath = values.labeled ?? 'data/labeled-queries.json';
  const rawK = values.k ?? '10';
  const k = Number(rawK);
  if (!Number.isInteger(k) || k < 1) throw new Error(`--k must be a positive integer, got "${rawK}"`);
  const rawMatchOn = values['match-on'] ?? 'url';
  if (!isMatchOn(rawMatchOn)) throw new Error(`--match-on must be "id" or "url", got "${rawMatchOn}"`);
  const matchOn = rawMatchOn;

  const config = loadAppConfig();
  setLogLevel(config.logLevel);
  const { engine } = createPipelineDeps(config);
  await engine.reload();

  const labeled = await loadLabeledQueries(labeledPath);
  const evaluation = await evaluateRecommender(engine, labeled, { k, matchOn });
  process.stdout.write(`${formatReport(evaluation)}\n`);

  if (values.predictions) {
    const csv = await buildPredictionsCsv(engine, labeled.map((l) => l.query), k);
    await writeFile(values.predictions, csv, 'utf-8');
    logger.info('evaluate:predictions_written', { path: values.predictions, queries: labeled.length });
  }
}

main().catch((err: unknown) => {
  logger.fatal('evaluate:failed', { error: errorMessage(err) });
  process.exit(1);
});
