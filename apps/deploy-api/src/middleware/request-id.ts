/**
 * @module @pagesmith/deploy-api/middleware/request-id
 * Request ID generation and correlation middleware
 */

import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import { ulid } from 'ulid';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Fastify options that take the id from `X-Request-Id` when the caller sent
 * one and mint a ULID otherwise. The id is bound to every request log line.
 */
export const requestIdOptions = {
  requestIdHeader: REQUEST_ID_HEADER,
  requestIdLogLabel: 'requestId',
  genReqId: () => ulid(),
} satisfies FastifyServerOptions;

/**
 * Echo the request id back to the caller
 */
export function registerRequestIdMiddleware(server: FastifyInstance): void {
  server.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-Id', request.id);
  });
}
