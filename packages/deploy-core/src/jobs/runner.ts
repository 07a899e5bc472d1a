/**
 * @module @pagesmith/deploy-core/jobs/runner
 * Detached execution of accepted jobs
 */

import type { JobStatus } from '@pagesmith/api-contracts';
import { errorMessage, type Logger } from '../logging.js';
import type { RunOptions } from '../pipeline/orchestrator.js';
import type { JobOutcome, JobRequest } from '../pipeline/types.js';
import type { JobRegistry } from './registry.js';

/**
 * Anything that can run a job to a terminal outcome
 */
export interface JobPipeline {
  run(job: JobRequest, options?: RunOptions): Promise<JobOutcome>;
}

export class JobRunner {
  private inFlight = new Map<string, Promise<void>>();
  private readonly logger: Logger;

  constructor(
    private pipeline: JobPipeline,
    private registry: JobRegistry,
    logger: Logger
  ) {
    this.logger = logger.child({ scope: 'runner' });
  }

  /**
   * Register `job` and start it on a later turn of the event loop, so the
   * caller can answer before any stage runs.
   */
  submit(job: JobRequest): JobStatus {
    const status = this.registry.create(job.taskId);
    const { jobId } = status;

    const run = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.execute(jobId, job))
      .finally(() => {
        this.inFlight.delete(jobId);
      });
    this.inFlight.set(jobId, run);

    this.logger.info({ jobId, taskId: job.taskId }, 'Job accepted');
    return status;
  }

  get activeCount(): number {
    return this.inFlight.size;
  }

  /**
   * Resolves once every job submitted so far has settled
   */
  async drain(): Promise<void> {
    await Promise.allSettled(Array.from(this.inFlight.values()));
  }

  private async execute(jobId: string, job: JobRequest): Promise<void> {
    try {
      const outcome = await this.pipeline.run(job, {
        jobId,
        onStage: (stage) => this.registry.updateStage(jobId, stage),
      });
      this.registry.complete(jobId, outcome);
    } catch (error) {
      this.logger.error({ jobId, error: errorMessage(error) }, 'Pipeline escaped with an error');
      const stage = this.registry.get(jobId)?.stage ?? 'received';
      this.registry.complete(jobId, { status: 'failed', stage, error: errorMessage(error) });
    }
  }
}
