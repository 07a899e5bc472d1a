/**
 * @module @pagesmith/deploy-api/bootstrap
 * Server bootstrap and startup
 */

import {
  JobRegistry,
  JobRunner,
  createLogger,
  createPipeline,
  loadDeployConfig,
  validateRuntimeConfig,
} from '@pagesmith/deploy-core';
import { createServer } from './server.js';
import { startCleanupTask } from './tasks/cleanup.js';

/**
 * Load configuration, start the HTTP server and install signal handlers.
 * Shutdown stops accepting requests, then waits for in-flight jobs.
 */
export async function bootstrap(cwd: string = process.cwd()): Promise<void> {
  const { config, diagnostics } = await loadDeployConfig({ cwd });
  const logger = createLogger({ level: config.logLevel });
  const bootstrapLogger = logger.child({ scope: 'bootstrap' });

  for (const diagnostic of diagnostics) {
    bootstrapLogger.warn({ level: diagnostic.level, code: diagnostic.code }, diagnostic.message);
  }

  const problems = validateRuntimeConfig(config);
  if (problems.length > 0) {
    for (const problem of problems) {
      bootstrapLogger.error(problem);
    }
    throw new Error(`Configuration incomplete: ${problems.join('; ')}`);
  }

  const registry = new JobRegistry();
  const runner = new JobRunner(createPipeline(config, logger), registry, logger);
  const server = await createServer(config, { logger, registry, runner });
  const stopCleanup = startCleanupTask({ registry, config, logger });

  const address = await server.listen({ port: config.port, host: config.host });
  bootstrapLogger.info(
    { address, account: config.github.username, llmProvider: config.llm.provider },
    'Deployment service listening'
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    bootstrapLogger.warn({ signal, activeJobs: runner.activeCount }, 'Received shutdown signal');

    stopCleanup();
    await server.close();
    bootstrapLogger.info('Server closed');
    await runner.drain();
    bootstrapLogger.info('In-flight jobs settled');
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        bootstrapLogger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}
