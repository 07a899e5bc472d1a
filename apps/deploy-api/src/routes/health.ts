/**
 * @module @pagesmith/deploy-api/routes/health
 * Liveness endpoint
 */

import type { FastifyInstance } from 'fastify';

export function registerHealthRoutes(fastify: FastifyInstance): void {
  fastify.get('/health', async () => ({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  }));
}
