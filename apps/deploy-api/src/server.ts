/**
 * @module @pagesmith/deploy-api/server
 * Fastify server setup
 */

import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { DeployConfig, JobRegistry, JobRunner, Logger } from '@pagesmith/deploy-core';
import { registerMiddleware, requestIdOptions } from './middleware/index.js';
import { registerRoutes } from './routes/index.js';

const BODY_LIMIT_BYTES = 1_048_576;

export interface ServerDeps {
  logger: Logger;
  registry: JobRegistry;
  runner: JobRunner;
}

/**
 * Create and configure Fastify server
 */
export async function createServer(config: DeployConfig, deps: ServerDeps): Promise<FastifyInstance> {
  const logger: FastifyBaseLogger = deps.logger.child({ scope: 'http' });

  const server = Fastify({
    logger,
    ...requestIdOptions,
    bodyLimit: BODY_LIMIT_BYTES,
  });

  registerMiddleware(server, config);
  registerRoutes(server, config, { registry: deps.registry, runner: deps.runner });

  await server.ready();
  return server;
}

export { normalizeBasePath } from './routes/index.js';
export type { RouteDeps } from './routes/index.js';
