// src/routes/health.ts: catalog and dependency status
import express, { type Request, type Response, type NextFunction } from 'express';
import type { EngineHealth } from '@/services/recommendation-engine';

export interface HealthSource {
  health(): Promise<EngineHealth>;
}

export function createHealthRouter(source: HealthSource) {
  const router = express.Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const health = await source.health();
      res.status(health.status === 'unavailable' ? 503 : 200).json({
        ...health,
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
