// src/routes/info.ts: static endpoint and limits description
import express, { type Request, type Response } from 'express';
import type { AppConfig } from '@/config/app.config';
import { ASSESSMENT_CATEGORIES } from '@/types/catalog';

export function createInfoRouter(config: AppConfig) {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.status(200).json({
      name: 'assessment-recommender',
      endpoints: {
        'POST /recommend': 'Body { query: string, k?: integer }. Returns recommended_assessments.',
        'GET /health': 'Catalog, embedding and reranker status.',
        'GET /api/info': 'This document.',
      },
      limits: {
        maxQueryLength: config.recommendation.maxQueryLength,
        defaultResults: config.recommendation.defaultResults,
        maxResults: config.recommendation.maxResults,
        requestTimeoutMs: config.requestTimeoutMs,
      },
      categories: ASSESSMENT_CATEGORIES,
    });
  });

  return router;
}
