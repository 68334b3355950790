import type { Request, Response, NextFunction } from 'express';
import { isRecommendationError } from '@/errors/recommendation-errors';
import { createErrorResponse } from '@/utils/errorResponse';
import { getCorrelationId } from '@/middleware/correlation';
import { logger } from '@/services/logger';

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse('Endpoint not found', undefined, 'not_found'));
}

export function errorMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const correlationId = getCorrelationId(req);

  if (res.headersSent) {
    logger.warn('http:error_after_headers', { correlationId, path: req.path });
    return;
  }

  if (isRecommendationError(err)) {
    const log = err.statusCode >= 500 ? logger.error.bind(logger) : logger.info.bind(logger);
    log('http:recommendation_error', { correlationId, code: err.code, message: err.message });
    res.status(err.statusCode).json(createErrorResponse(err.message, undefined, err.code));
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json(createErrorResponse('Request body must be valid JSON', undefined, 'invalid_request'));
    return;
  }

  logger.error('http:unhandled_error', {
    correlationId,
    path: req.path,
    error: err instanceof Error ? err.message : String(err),
  });
  res.status(500).json(createErrorResponse('Internal Server Error', undefined, 'internal_error'));
}
