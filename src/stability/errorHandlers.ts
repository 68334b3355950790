// Process-level error handlers, graceful shutdown and per-request deadlines.

import type { Server } from 'http';
import type { Request, Response, NextFunction } from 'express';
import { createErrorResponse } from '@/utils/errorResponse';
import { logger } from '@/services/logger';

let serverInstance: Server | null = null;
let shuttingDown = false;

/**
 * Set server instance for graceful shutdown
 */
export function setServerInstance(server: Server): void {
  serverInstance = server;
}

export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    // Keep serving in production; fail fast elsewhere.
    if (nodeEnv !== 'production') {
      void gracefulShutdown('unhandledRejection', 1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { message: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  // Give in-flight requests time to finish (15 seconds)
  const forceExit = setTimeout(() => {
    logger.error('process:forced_shutdown');
    process.exit(1);
  }, 15000);
  forceExit.unref();

  try {
    if (serverInstance) {
      const server = serverInstance;
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      logger.info('process:http_closed');
    }
    clearTimeout(forceExit);
    process.exit(exitCode);
  } catch (error) {
    logger.error('process:shutdown_failed', { error: error instanceof Error ? error.message : String(error) });
    clearTimeout(forceExit);
    process.exit(1);
  }
}

const requestControllers = new WeakMap<Request, AbortController>();

/**
 * Signal that aborts when the client disconnects or the request deadline
 * passes. Requests that did not pass through `requestTimeout` get a signal
 * that never aborts.
 */
export function getRequestSignal(req: Request): AbortSignal {
  return requestControllers.get(req)?.signal ?? new AbortController().signal;
}

/**
 * Request deadline middleware: answers 408 after `timeoutMs` and aborts the
 * request's signal so in-flight embedding/rerank calls are cancelled.
 */
export function requestTimeout(timeoutMs = 15000) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const controller = new AbortController();
    requestControllers.set(req, controller);

    const timeout = setTimeout(() => {
      controller.abort(new Error(`Request exceeded ${timeoutMs}ms timeout`));
      if (!res.headersSent) {
        res
          .status(408)
          .json(createErrorResponse(`Request exceeded ${timeoutMs}ms timeout`, undefined, 'request_timeout'));
      }
    }, timeoutMs);

    res.on('finish', () => {
      clearTimeout(timeout);
    });

    res.on('close', () => {
      clearTimeout(timeout);
      if (!res.writableFinished) controller.abort(new Error('Client disconnected'));
    });

    next();
  };
}
