// src/middleware/correlation.ts: correlation ID for request logs
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

const correlationIds = new WeakMap<Request, string>();

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header('x-correlation-id');
  const correlationId = headerId && headerId.length <= 128 ? headerId : randomUUID();

  correlationIds.set(req, correlationId);
  res.setHeader('x-correlation-id', correlationId);
  next();
}

export function getCorrelationId(req: Request): string | undefined {
  return correlationIds.get(req);
}
