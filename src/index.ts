// Load environment variables FIRST
import 'dotenv/config';

import { loadAppConfig } from '@/config/app.config';
import { createPipelineDeps } from '@/services/pipeline-deps';
import { createApp } from '@/app';
import { InternalInconsistency, errorMessage } from '@/errors/recommendation-errors';
import { logger, setLogLevel } from '@/services/logger';
import {
  setupUnhandledRejectionHandler,
  setupUncaughtExceptionHandler,
  setupGracefulShutdown,
  setServerInstance,
} from '@/stability/errorHandlers';

const startServer = async () => {
  const config = loadAppConfig();
  setLogLevel(config.logLevel);

  setupUnhandledRejectionHandler(config.nodeEnv);
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  const { engine, embedder, reranker } = createPipelineDeps(config);
  try {
    await engine.reload();
  } catch (err) {
    if (err instanceof InternalInconsistency) {
      logger.fatal('startup:catalog_inconsistent', { error: err.message, ...err.metadata });
    } else {
      logger.fatal('startup:catalog_load_failed', { path: config.catalogPath, error: errorMessage(err) });
    }
    process.exit(1);
  }

  process.on('SIGHUP', () => {
    logger.info('process:signal', { signal: 'SIGHUP' });
    engine.reload().catch((err: unknown) => {
      logger.error('catalog:reload_failed', { error: errorMessage(err) });
    });
  });

  const app = createApp(engine, config);
  const server = app.listen(config.port, () => {
    logger.info('startup:listening', {
      port: config.port,
      env: config.nodeEnv,
      embedder: embedder.id,
      reranker: reranker?.name ?? null,
    });
  });
  setServerInstance(server);
};

startServer().catch((err: unknown) => {
  logger.fatal('startup:failed', { error: errorMessage(err) });
  process.exit(1);
});
