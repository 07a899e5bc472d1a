/**
 * @module @pagesmith/deploy-api/middleware
 * Middleware registration
 */

import type { FastifyInstance } from 'fastify';
import type { DeployConfig } from '@pagesmith/deploy-core';
import { registerEnvelopeMiddleware } from './envelope.js';
import { registerRequestIdMiddleware } from './request-id.js';

export { requestIdOptions, REQUEST_ID_HEADER } from './request-id.js';

/**
 * Register all middleware
 */
export function registerMiddleware(server: FastifyInstance, config: DeployConfig): void {
  registerRequestIdMiddleware(server);
  registerEnvelopeMiddleware(server, config);
}
