import { initTracing, shutdownTracing } from './observability/tracing';

// Instrumentation has to be registered before express, mongoose and ioredis load
initTracing();

import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { buildServices, createDefaultDependencies } from './container';
import { logger } from './observability';
import { closeReconciliationQueue, startReconciliationWorker, stopReconciliationWorker } from './queues';

const startServer = async (): Promise<void> => {
  logger.info(getEnvironmentInfo(), 'Starting subsidy API');

  await connectDatabase();

  try {
    await connectRedis();
  } catch (error) {
    logger.warn({ err: error }, 'Redis unavailable; response cache and shared rate limits are off');
  }

  const services = buildServices(createDefaultDependencies());
  const app = createApp(services);

  startReconciliationWorker(services.ledger);

  const server = app.listen(config.port, () => {
    logger.info(
      { port: config.port, env: config.nodeEnv, health: `http://localhost:${config.port}/health` },
      'Server started'
    );
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Starting graceful shutdown');

    server.close(() => {
      logger.info('HTTP server closed');

      const cleanup = async (): Promise<void> => {
        await stopReconciliationWorker();
        await closeReconciliationQueue();
        await disconnectRedis();
        await disconnectDatabase();
        await shutdownTracing();
      };

      cleanup()
        .then(() => {
          logger.info('Graceful shutdown completed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startServer().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
