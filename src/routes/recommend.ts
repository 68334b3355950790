// src/routes/recommend.ts: validates the body, runs the engine and maps records to the wire shape
import express, { type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import type { CatalogRecord } from '@/types/catalog';
import type { Recommender } from '@/services/recommendation-engine';
import { createErrorResponse } from '@/utils/errorResponse';
import { getRequestSignal } from '@/stability/errorHandlers';
import { getCorrelationId } from '@/middleware/correlation';
import { logger } from '@/services/logger';

const recommendBodySchema = z.object({
  query: z.string().trim().min(1, 'query must be a non-empty string'),
  k: z.number().int().min(1, 'k must be at least 1').optional(),
});

export type RecommendBody = z.infer<typeof recommendBodySchema>;

export interface RecommendedAssessment {
  url: string;
  name: string;
  adaptive_support: 'Yes' | 'No';
  description: string;
  duration: number | null;
  remote_support: 'Yes' | 'No';
  test_type: string[];
}

function yesNo(flag: boolean): 'Yes' | 'No' {
  return flag ? 'Yes' : 'No';
}

export function toRecommendedAssessment(record: CatalogRecord): RecommendedAssessment {
  return {
    url: record.url,
    name: record.name,
    adaptive_support: yesNo(record.adaptiveSupport),
    description: record.description,
    duration: record.durationMinutes,
    remote_support: yesNo(record.remoteSupport),
    test_type: [...record.categories],
  };
}

export function validateRecommendBody(
  body: unknown,
): { success: true; data: RecommendBody } | { success: false; errors: Array<{ path: string; message: string }> } {
  const result = recommendBodySchema.safeParse(body ?? {});
  if (result.success) return { success: true, data: result.data };
  return {
    success: false,
    errors: result.error.errors.map((e) => ({ path: e.path.join('.') || 'body', message: e.message })),
  };
}

export function createRecommendRouter(recommender: Recommender) {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateRecommendBody(req.body);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid request body', validation.errors, 'invalid_query'));
      return;
    }

    const { query, k } = validation.data;
    const started = Date.now();
    try {
      const result = await recommender.recommend(query, k, { signal: getRequestSignal(req) });
      if (res.headersSent) return;

      logger.info('recommend:served', {
        correlationId: getCorrelationId(req),
        count: result.records.length,
        scoring: result.scoring,
        reranked: result.reranked,
        ms: Date.now() - started,
      });
      res.setHeader('x-recommendation-scoring', result.scoring);
      res.status(200).json({ recommended_assessments: result.records.map(toRecommendedAssessment) });
    } catch (err) {
      if (res.headersSent) {
        logger.warn('recommend:aborted', { correlationId: getCorrelationId(req), ms: Date.now() - started });
        return;
      }
      next(err);
    }
  });

  return router;
}
