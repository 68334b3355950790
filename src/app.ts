// src/app.ts: Express app: hardening, access logs, routes, error handling
import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import type { AppConfig } from '@/config/app.config';
import type { Recommender } from '@/services/recommendation-engine';
import type { HealthSource } from '@/routes/health';
import { createRecommendRouter } from '@/routes/recommend';
import { createHealthRouter } from '@/routes/health';
import { createInfoRouter } from '@/routes/info';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorMiddleware, notFoundHandler } from '@/middleware/error.middleware';
import { requestTimeout } from '@/stability/errorHandlers';
import { logger } from '@/services/logger';

export function createApp(engine: Recommender & HealthSource, config: AppConfig): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true,
    }),
  );

  if (config.nodeEnv === 'production') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: config.rateLimitPerMinute,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
    logger.info('http:rate_limit_enabled', { perMinute: config.rateLimitPerMinute });
  }

  app.use(attachCorrelationId);
  app.use(requestTimeout(config.requestTimeoutMs));

  app.use(express.json({ limit: '100kb' }));
  app.use(compression());

  if (config.nodeEnv === 'development') {
    app.use(morgan('dev'));
  } else if (config.nodeEnv !== 'test') {
    app.use(morgan('combined'));
  }

  app.use('/health', createHealthRouter(engine));
  app.use('/api/info', createInfoRouter(config));
  app.use('/recommend', createRecommendRouter(engine));

  app.use(notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
