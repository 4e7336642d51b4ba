import { env } from './config/env.js';
import { loadBanditConfig } from './config/bandit.js';
import { logger } from './config/logger.js';
import { createApp } from './app.js';
import { createContainer } from './container.js';
import { disconnect } from './db/client.js';

/**
 * Main web server entry point
 * Run with RUN_MODE=web
 */

async function startServer() {
  logger.info('Starting caption selection server');
  logger.info(`Environment: ${env.NODE_ENV}`);
  logger.info(`Run Mode: ${env.RUN_MODE}`);

  const config = loadBanditConfig(env);
  const app = createApp(createContainer(config));

  const server = app.listen(env.PORT, () => {
    logger.info(`Server listening on port ${env.PORT}`);
    logger.info(`Health check: http://localhost:${env.PORT}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down gracefully...');

    server.close(() => {
      logger.info('HTTP server closed');
      disconnect()
        .then(() => process.exit(0))
        .catch((error) => {
          logger.error('Failed to close database pool', { error });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

if (env.RUN_MODE === 'web') {
  startServer().catch((error) => {
    logger.error('Failed to start server', { error });
    process.exit(1);
  });
} else {
  logger.warn(`RUN_MODE is ${env.RUN_MODE}, not starting web server`);
}
