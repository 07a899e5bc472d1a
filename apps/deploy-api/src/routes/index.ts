/**
 * @module @pagesmith/deploy-api/routes
 * Route registration
 */

import type { FastifyInstance } from 'fastify';
import type { DeployConfig, JobRegistry, JobRunner } from '@pagesmith/deploy-core';
import { registerHealthRoutes } from './health.js';
import { registerJobRoutes } from './jobs.js';
import { registerTaskRoutes } from './tasks.js';

export interface RouteDeps {
  registry: JobRegistry;
  runner: JobRunner;
}

export function normalizeBasePath(basePath?: string): string {
  if (!basePath || basePath === '/') {
    return '';
  }
  return basePath.endsWith('/') ? basePath.slice(0, -1) : basePath;
}

/**
 * Register all routes. Health and task intake sit at the root; the job API
 * lives under `basePath`.
 */
export function registerRoutes(server: FastifyInstance, config: DeployConfig, deps: RouteDeps): void {
  registerHealthRoutes(server);
  registerTaskRoutes(server, config, deps.runner);
  registerJobRoutes(server, normalizeBasePath(config.basePath), deps.registry);
}
