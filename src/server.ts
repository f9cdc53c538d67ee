/**
 * =============================================================================
 * PARCEL QUOTE BACKEND - MAIN SERVER
 * =============================================================================
 *
 * Validates the environment, builds the container, connects the cache and
 * starts listening. SIGTERM/SIGINT close the HTTP server first, then the
 * cache connection.
 * =============================================================================
 */

import { createServer } from 'http';
import { validateAndLogEnvironment } from './core/config/env.validation';
import { config } from './config/environment';
import { logger } from './shared/services/logger.service';
import { errorMessage } from './core/errors/AppError';
import { createContainer } from './container';
import { createApp } from './app';

// =============================================================================
// ENVIRONMENT VALIDATION (Fail fast if config is invalid)
// =============================================================================

validateAndLogEnvironment();

const container = createContainer(config);

const app = createApp(container, {
  corsOrigin: config.cors.origin,
  rateLimit: config.rateLimit,
  exposeInternalErrors: !config.isProduction,
  trustProxy: config.trustProxy,
  version: config.version,
  environment: config.nodeEnv
});

const server = createServer(app);

// =============================================================================
// START SERVER
// =============================================================================

async function start(): Promise<void> {
  await container.cache.initialize();

  server.listen(config.port, config.host, () => {
    logger.info(`🚚 Parcel quote backend listening on http://${config.host}:${config.port}`, {
      environment: config.nodeEnv,
      cache: container.cache.kind,
      routing: container.routeProvider.name
    });
  });
}

start().catch((error: unknown) => {
  logger.error(`Startup failed: ${errorMessage(error)}`);
  process.exit(1);
});

// =============================================================================
// ERROR HANDLING & GRACEFUL SHUTDOWN
// =============================================================================

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
});

let shuttingDown = false;

const gracefulShutdown = (signal: string): void => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close(() => {
    logger.info('HTTP server closed');

    void container.cache.close()
      .then(() => logger.info('Cache connection closed'))
      .catch((err: unknown) => logger.error(`Error closing cache connection: ${errorMessage(err)}`))
      .finally(() => {
        logger.info('Graceful shutdown complete');
        process.exit(0);
      });
  });

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
