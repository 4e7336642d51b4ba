import { env } from './config/env.js';
import { loadBanditConfig } from './config/bandit.js';
import { logger } from './config/logger.js';
import { createContainer } from './container.js';
import { disconnect } from './db/client.js';

/**
 * Worker process for the feedback update and lock sweep jobs
 * Run with RUN_MODE=worker
 */

async function startWorker() {
  logger.info('Starting caption selection worker');
  logger.info(`Environment: ${env.NODE_ENV}`);

  const container = createContainer(loadBanditConfig(env));

  // Halt timers only: jobs stay marked running in job_state and resume on the next start
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    container.jobRestore
      .haltAllJobs()
      .then(() => disconnect())
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Worker shutdown failed', { error });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  const { restored, skipped, failed } = await container.jobRestore.restoreAllJobs();
  logger.info('Background jobs restoration summary', { restored, skipped, failed });

  // Jobs not restored start fresh; start() still honors a persisted enabled=false
  for (const name of skipped) {
    await container.jobs[name]?.start();
  }
}

startWorker().catch((error) => {
  logger.error('Worker failed to start', { error });
  process.exit(1);
});
