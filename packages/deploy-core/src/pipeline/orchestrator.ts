/**
 * @module @pagesmith/deploy-core/pipeline/orchestrator
 * Linear job pipeline: generate → provision → publish → poll → report
 */

import type { ArtifactProducer, ArtifactResult } from '../artifact/types.js';
import { artifactFromObject } from '../artifact/parse.js';
import { fallbackResult } from '../artifact/fallback.js';
import { errorMessage, type Logger } from '../logging.js';
import { ErrorCode, isDeployError } from '../utils/errors.js';
import type { RepositoryProvisioner } from './provisioner.js';
import type { Publisher } from './publisher.js';
import type { ReadinessPoller } from './poller.js';
import type { ResultReporter } from './reporter.js';
import { withWorkspace } from './workspace.js';
import { toResultRecord, type DeliveryOutcome, type DoneOutcome, type JobOutcome, type JobRequest, type JobStage } from './types.js';

export interface OrchestratorSettings {
  pagesMaxWaitSec: number;
  workspacePrefix: string;
}

export interface OrchestratorDeps {
  producer: ArtifactProducer;
  provisioner: RepositoryProvisioner;
  publisher: Publisher;
  poller: ReadinessPoller;
  reporter: ResultReporter;
  logger: Logger;
  settings: OrchestratorSettings;
}

export type StageListener = (stage: JobStage) => void;

export interface RunOptions {
  jobId?: string;
  onStage?: StageListener;
}

interface RunProgress {
  stage: JobStage;
  artifact?: ArtifactResult['source'];
}

export class PipelineOrchestrator {
  private readonly logger: Logger;

  constructor(private deps: OrchestratorDeps) {
    this.logger = deps.logger.child({ scope: 'orchestrator' });
  }

  /**
   * Run one job to a terminal stage. Never throws: every stage error is
   * logged with job context and folded into a `failed` outcome.
   */
  async run(job: JobRequest, options: RunOptions = {}): Promise<JobOutcome> {
    const log = this.logger.child({ jobId: options.jobId, taskId: job.taskId });
    const progress: RunProgress = { stage: 'received' };

    const enter = (stage: JobStage): void => {
      progress.stage = stage;
      log.info({ stage }, 'Entering stage');
      try {
        options.onStage?.(stage);
      } catch (error) {
        log.warn({ stage, error: errorMessage(error) }, 'Stage listener threw');
      }
    };

    try {
      const outcome = await withWorkspace(this.deps.settings.workspacePrefix, log, async (workDir) => {
        enter('generating');
        const artifact = await this.generate(job, log);
        progress.artifact = artifact.source;

        enter('provisioning');
        const repo = await this.deps.provisioner.provision(job.taskId, artifact.files, job.brief, workDir);

        enter('publishing');
        const publication = await this.deps.publisher.publish(repo);

        enter('polling');
        const pagesReady = await this.deps.poller.awaitReady(publication.pagesUrl, this.deps.settings.pagesMaxWaitSec);

        let delivery: DeliveryOutcome | undefined;
        if (job.callbackUrl) {
          enter('reporting');
          delivery = await this.deps.reporter.report(job.callbackUrl, toResultRecord(job, repo, publication));
        } else {
          log.warn('No callback URL; skipping result report');
        }

        const done: DoneOutcome = {
          status: 'done',
          artifact: artifact.source,
          repo,
          publication,
          pagesReady,
          delivery,
        };
        return done;
      });

      enter('done');
      log.info({ repoUrl: outcome.repo.htmlUrl, pagesUrl: outcome.publication.pagesUrl }, 'Job finished');
      return outcome;
    } catch (error) {
      const failedAt = progress.stage;
      log.error(
        {
          stage: failedAt,
          code: isDeployError(error) ? error.code : ErrorCode.INTERNAL,
          error: errorMessage(error),
        },
        'Job failed'
      );
      enter('failed');
      return { status: 'failed', stage: failedAt, error: errorMessage(error), artifact: progress.artifact };
    }
  }

  /**
   * Producer output, with the fallback artifact substituted when the producer
   * throws or yields no usable file.
   */
  private async generate(job: JobRequest, log: Logger): Promise<ArtifactResult> {
    const request = { taskId: job.taskId, brief: job.brief };

    let result: ArtifactResult;
    try {
      result = await this.deps.producer.produce(request);
    } catch (error) {
      const reason = `producer threw: ${errorMessage(error)}`;
      log.warn({ code: ErrorCode.GENERATION_DEGRADED, reason }, 'Using fallback artifact');
      return fallbackResult(request, reason);
    }

    const checked = artifactFromObject(result.files);
    if (checked.kind === 'unusable') {
      log.warn({ code: ErrorCode.GENERATION_DEGRADED, reason: checked.reason }, 'Using fallback artifact');
      return fallbackResult(request, checked.reason);
    }
    if (checked.dropped.length > 0) {
      log.warn({ dropped: checked.dropped }, 'Dropped unsafe artifact entries');
    }
    return { ...result, files: checked.files };
  }
}
