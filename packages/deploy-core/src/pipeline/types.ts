/**
 * @module @pagesmith/deploy-core/pipeline/types
 * Entities owned by a single job
 */

import type { JobStage, ResultRecord } from '@pagesmith/api-contracts';
import type { ArtifactResult } from '../artifact/types.js';

export type { JobStage, ResultRecord };

/**
 * Validated job descriptor handed over by the front door. `email`, `round` and
 * `nonce` are opaque to the pipeline and echoed in the result record.
 */
export interface JobRequest {
  readonly taskId: string;
  readonly brief: string;
  readonly callbackUrl?: string;
  readonly email: string;
  readonly round: number;
  readonly nonce: string;
}

export interface ProvisionedRepo {
  readonly htmlUrl: string;
  readonly cloneUrl: string;
  /** 40 hex characters */
  readonly commitSha: string;
  /** Repository name on the provider */
  readonly remoteName: string;
  readonly owner: string;
}

export interface PublicationTarget {
  readonly pagesUrl: string;
}

export type PublicationMethod = 'pages-api' | 'settings-update' | 'none';

/**
 * Publisher result. `confirmed` is true only when the pages endpoint answered
 * created or already-enabled; the URL is present either way.
 */
export interface PublicationOutcome extends PublicationTarget {
  readonly confirmed: boolean;
  readonly method: PublicationMethod;
  readonly alreadyEnabled?: boolean;
}

export interface DeliveryOutcome {
  readonly delivered: boolean;
  readonly attempts: number;
  readonly lastStatus?: number;
  readonly lastError?: string;
}

export interface DoneOutcome {
  status: 'done';
  artifact: ArtifactResult['source'];
  repo: ProvisionedRepo;
  publication: PublicationOutcome;
  pagesReady: boolean;
  /** Absent when the job carried no callback URL */
  delivery?: DeliveryOutcome;
}

export interface FailedOutcome {
  status: 'failed';
  /** Stage that was running when the job failed */
  stage: JobStage;
  error: string;
  artifact?: ArtifactResult['source'];
}

export type JobOutcome = DoneOutcome | FailedOutcome;

export function computePagesUrl(account: string, pagesDomain: string, repoName: string): string {
  return `https://${account}.${pagesDomain}/${repoName}/`;
}

export function toResultRecord(job: JobRequest, repo: ProvisionedRepo, target: PublicationTarget): ResultRecord {
  return Object.freeze({
    email: job.email,
    taskId: job.taskId,
    round: job.round,
    nonce: job.nonce,
    repoUrl: repo.htmlUrl,
    commitSha: repo.commitSha,
    pagesUrl: target.pagesUrl,
  });
}
