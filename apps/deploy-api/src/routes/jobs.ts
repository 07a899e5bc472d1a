/**
 * @module @pagesmith/deploy-api/routes/jobs
 * Read-only job status
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError, ValidationError, type JobRegistry } from '@pagesmith/deploy-core';

const jobParamsSchema = z.object({
  jobId: z.string().min(1),
});

export function registerJobRoutes(fastify: FastifyInstance, basePath: string, registry: JobRegistry): void {
  fastify.get(`${basePath}/jobs`, async () => ({
    jobs: registry.list(),
    stats: registry.getStats(),
  }));

  fastify.get(`${basePath}/jobs/:jobId`, async (request) => {
    const params = jobParamsSchema.safeParse(request.params);
    if (!params.success) {
      throw new ValidationError('Invalid job id');
    }

    const job = registry.get(params.data.jobId);
    if (!job) {
      throw new NotFoundError('Job', params.data.jobId);
    }
    return job;
  });
}
