/**
 * @module @pagesmith/deploy-api/routes/tasks
 * Task intake: validate, authenticate, hand over to the job runner
 */

import type { FastifyInstance } from 'fastify';
import {
  REQUIRED_TASK_FIELDS,
  taskSubmissionSchema,
  type TaskAccepted,
} from '@pagesmith/api-contracts';
import { ForbiddenError, ValidationError, type DeployConfig, type JobRunner } from '@pagesmith/deploy-core';
import { secretsMatch } from '../utils/secret.js';

export const TASK_ENDPOINT = '/api-endpoint';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

export function registerTaskRoutes(fastify: FastifyInstance, config: DeployConfig, runner: JobRunner): void {
  fastify.post(TASK_ENDPOINT, async (request, reply) => {
    const body = request.body;
    if (!isRecord(body)) {
      throw new ValidationError('Request body must be a JSON object');
    }

    const missing = REQUIRED_TASK_FIELDS.filter((field) => isMissing(body[field]));
    if (missing.length > 0) {
      throw new ValidationError(`Missing required fields: ${missing.join(', ')}`, { missing });
    }

    if (typeof body.secret !== 'string' || !secretsMatch(body.secret, config.sharedSecret)) {
      throw new ForbiddenError('Invalid secret');
    }

    const parsed = taskSubmissionSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError('Invalid task submission', {
        issues: parsed.error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }

    const submission = parsed.data;
    const status = runner.submit({
      taskId: submission.task,
      brief: submission.brief,
      callbackUrl: submission.evaluation?.url,
      email: submission.email,
      round: submission.round,
      nonce: submission.nonce,
    });

    request.log.info({ jobId: status.jobId, taskId: submission.task, round: submission.round }, 'Task accepted');

    const accepted: TaskAccepted = {
      status: 'accepted',
      message: `Task ${submission.task} received and is being processed`,
      task: submission.task,
      jobId: status.jobId,
      timestamp: new Date().toISOString(),
    };
    reply.code(200);
    return accepted;
  });
}
