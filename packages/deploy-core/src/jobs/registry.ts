/**
 * @module @pagesmith/deploy-core/jobs/registry
 * In-memory job status registry
 */

import { ulid } from 'ulid';
import { TERMINAL_STAGES, type JobStatus } from '@pagesmith/api-contracts';
import type { JobOutcome, JobStage } from '../pipeline/types.js';

export interface JobRegistryStats {
  size: number;
  active: number;
  done: number;
  failed: number;
}

/**
 * Process-local view of submitted jobs. Nothing is persisted; finished jobs
 * are evicted by `cleanup`.
 */
export class JobRegistry {
  private jobs = new Map<string, JobStatus>();

  constructor(private now: () => Date = () => new Date()) {}

  create(taskId: string): JobStatus {
    const job: JobStatus = {
      jobId: ulid(),
      taskId,
      stage: 'received',
      createdAt: this.now().toISOString(),
    };
    this.jobs.set(job.jobId, job);
    return { ...job };
  }

  get(jobId: string): JobStatus | null {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : null;
  }

  /**
   * Newest first
   */
  list(): JobStatus[] {
    return Array.from(this.jobs.values(), (job) => ({ ...job })).sort((a, b) =>
      b.createdAt.localeCompare(a.createdAt)
    );
  }

  updateStage(jobId: string, stage: JobStage): void {
    const job = this.jobs.get(jobId);
    if (!job || TERMINAL_STAGES.has(job.stage)) return;

    job.stage = stage;
    if (stage !== 'received' && !job.startedAt) {
      job.startedAt = this.now().toISOString();
    }
    if (TERMINAL_STAGES.has(stage)) {
      job.finishedAt = this.now().toISOString();
    }
  }

  complete(jobId: string, outcome: JobOutcome): void {
    const job = this.jobs.get(jobId);
    if (!job) return;

    job.stage = outcome.status;
    job.finishedAt ??= this.now().toISOString();
    job.artifactSource = outcome.artifact;

    if (outcome.status === 'done') {
      job.repoUrl = outcome.repo.htmlUrl;
      job.commitSha = outcome.repo.commitSha;
      job.pagesUrl = outcome.publication.pagesUrl;
      job.publicationConfirmed = outcome.publication.confirmed;
      job.pagesReady = outcome.pagesReady;
      job.callbackDelivered = outcome.delivery?.delivered;
    } else {
      job.error = outcome.error;
    }
  }

  /**
   * Remove finished jobs older than `ttlSec`
   * @returns number of evicted entries
   */
  cleanup(ttlSec: number): number {
    const now = this.now().getTime();
    const ttlMs = ttlSec * 1000;
    let cleaned = 0;

    for (const [jobId, job] of this.jobs.entries()) {
      if (!TERMINAL_STAGES.has(job.stage)) {
        continue;
      }
      const finishedAt = new Date(job.finishedAt ?? job.createdAt).getTime();
      if (now - finishedAt > ttlMs) {
        this.jobs.delete(jobId);
        cleaned++;
      }
    }

    return cleaned;
  }

  getStats(): JobRegistryStats {
    const jobs = Array.from(this.jobs.values());
    const done = jobs.filter((job) => job.stage === 'done').length;
    const failed = jobs.filter((job) => job.stage === 'failed').length;
    return { size: jobs.length, active: jobs.length - done - failed, done, failed };
  }
}
