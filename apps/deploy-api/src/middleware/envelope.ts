/**
 * @module @pagesmith/deploy-api/middleware/envelope
 * Response envelope wrapper and error handler
 */

import type { FastifyError, FastifyInstance } from 'fastify';
import { errorEnvelopeSchema, type EnvelopeMeta, type SuccessEnvelope } from '@pagesmith/api-contracts';
import { ErrorCode, NotFoundError, isDeployError, type DeployConfig } from '@pagesmith/deploy-core';

function isEnvelope(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'ok' in value;
}

/**
 * Code, status and details for a thrown error. Deploy errors carry their own;
 * Fastify's 4xx errors (bad JSON, wrong content type) count as validation
 * failures; anything else is internal and its message is not exposed.
 */
function describeError(error: FastifyError): {
  statusCode: number;
  code: string;
  message: string;
  details?: Record<string, unknown>;
} {
  if (isDeployError(error)) {
    return { statusCode: error.statusCode, code: error.code, message: error.message, details: error.details };
  }

  const statusCode = error.statusCode ?? 500;
  if (statusCode >= 400 && statusCode < 500) {
    return {
      statusCode,
      code: ErrorCode.VALIDATION,
      message: error.message,
      details: error.code ? { reason: error.code } : undefined,
    };
  }

  return { statusCode: 500, code: ErrorCode.INTERNAL, message: 'Internal server error' };
}

/**
 * Register envelope middleware
 */
export function registerEnvelopeMiddleware(server: FastifyInstance, config: DeployConfig): void {
  const meta = (requestId: string, durationMs: number): EnvelopeMeta => ({
    requestId,
    durationMs,
    apiVersion: config.apiVersion,
  });

  // onSend sees the serialized payload; wrap JSON bodies that are not envelopes yet
  server.addHook('onSend', async (request, reply, payload) => {
    reply.header('x-schema-version', config.apiVersion);

    if (typeof payload !== 'string') {
      return payload;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch {
      return payload;
    }

    if (isEnvelope(parsed)) {
      return payload;
    }

    const envelope: SuccessEnvelope = {
      ok: true,
      data: parsed ?? null,
      meta: meta(request.id, reply.elapsedTime),
    };

    reply.header('content-type', 'application/json; charset=utf-8');
    return JSON.stringify(envelope);
  });

  server.setNotFoundHandler(async (request) => {
    throw new NotFoundError('Route', `${request.method} ${request.url}`);
  });

  server.setErrorHandler(async (error, request, reply) => {
    const { statusCode, code, message, details } = describeError(error);

    if (statusCode >= 500) {
      request.log.error({ err: error, errorCode: code, statusCode }, 'Request error');
    } else {
      request.log.warn({ errorCode: code, statusCode, message }, 'Request rejected');
    }

    const envelope = errorEnvelopeSchema.parse({
      ok: false,
      error: { code, message, details },
      meta: meta(request.id, reply.elapsedTime),
    });

    reply.status(statusCode);
    return envelope;
  });
}
