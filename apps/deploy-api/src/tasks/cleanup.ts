/**
 * @module @pagesmith/deploy-api/tasks/cleanup
 * Periodic eviction of finished jobs
 */

import { errorMessage, type DeployConfig, type JobRegistry, type Logger } from '@pagesmith/deploy-core';

interface CleanupTaskOptions {
  registry: JobRegistry;
  config: DeployConfig;
  logger: Logger;
}

export function runCleanup({ registry, config, logger }: CleanupTaskOptions): number {
  try {
    const cleaned = registry.cleanup(config.jobs.ttlSec);
    if (cleaned > 0) {
      logger.info({ jobsCleaned: cleaned }, 'Cleanup completed');
    }
    return cleaned;
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Cleanup task error');
    return 0;
  }
}

/**
 * Start periodic cleanup
 * @returns stop function
 */
export function startCleanupTask(options: CleanupTaskOptions): () => void {
  const intervalMs = options.config.jobs.cleanupIntervalSec * 1000;
  const log = options.logger.child({ scope: 'cleanup' });

  const intervalId = setInterval(() => {
    runCleanup({ ...options, logger: log });
  }, intervalMs);
  // never keeps the process alive on its own
  intervalId.unref();

  return () => {
    clearInterval(intervalId);
  };
}
