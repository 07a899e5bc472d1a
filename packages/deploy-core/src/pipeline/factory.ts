/**
 * @module @pagesmith/deploy-core/pipeline/factory
 * Wires the pipeline stages from configuration
 */

import type { DeployConfig } from '../config/schema.js';
import type { Logger } from '../logging.js';
import type { HostingProviderPort } from '../ports/provider.js';
import type { GitPort } from '../ports/git.js';
import type { TextGenerator } from '../ports/generator.js';
import type { FetchLike } from '../ports/http.js';
import type { ArtifactProducer } from '../artifact/types.js';
import type { Clock, Sleep } from '../utils/backoff.js';
import { GitHubRestAdapter } from '../adapters/github/rest.js';
import { ExecaGitAdapter } from '../adapters/git/execa.js';
import { createTextGenerator } from '../adapters/llm/index.js';
import { GeneratedArtifactProducer } from '../artifact/producer.js';
import { RepositoryProvisioner } from './provisioner.js';
import { Publisher } from './publisher.js';
import { ReadinessPoller } from './poller.js';
import { ResultReporter } from './reporter.js';
import { PipelineOrchestrator } from './orchestrator.js';

/**
 * Replacements for the remote-facing pieces; anything omitted is built from config
 */
export interface PipelineOverrides {
  provider?: HostingProviderPort;
  git?: GitPort;
  generator?: TextGenerator;
  producer?: ArtifactProducer;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  clock?: Clock;
  now?: () => Date;
}

export function createPipeline(
  config: DeployConfig,
  logger: Logger,
  overrides: PipelineOverrides = {}
): PipelineOrchestrator {
  const provider = overrides.provider ?? new GitHubRestAdapter(config.github, overrides.fetchImpl);
  const git = overrides.git ?? new ExecaGitAdapter(config.pipeline.gitTimeoutMs);
  const producer =
    overrides.producer ??
    new GeneratedArtifactProducer(overrides.generator ?? createTextGenerator(config.llm), logger);
  const { sleep, clock, now, fetchImpl } = overrides;

  return new PipelineOrchestrator({
    producer,
    provisioner: new RepositoryProvisioner({
      provider,
      git,
      logger,
      sleep,
      now,
      settings: {
        defaultBranch: config.github.defaultBranch,
        pagesDomain: config.github.pagesDomain,
        descriptionMaxLength: config.pipeline.descriptionMaxLength,
        deletePropagationMs: config.pipeline.deletePropagationMs,
        commitMessage: config.pipeline.commitMessage,
        gitTimeoutMs: config.pipeline.gitTimeoutMs,
      },
    }),
    publisher: new Publisher({
      provider,
      logger,
      sleep,
      settings: {
        defaultBranch: config.github.defaultBranch,
        pagesDomain: config.github.pagesDomain,
        settingsPropagationMs: config.pipeline.settingsPropagationMs,
      },
    }),
    poller: new ReadinessPoller({
      logger,
      fetchImpl,
      sleep,
      clock,
      settings: { pollIntervalMs: config.pages.pollIntervalMs, probeTimeoutMs: config.pages.probeTimeoutMs },
    }),
    reporter: new ResultReporter({
      logger,
      fetchImpl,
      sleep,
      settings: {
        maxRetries: config.callback.maxRetries,
        initialDelayMs: config.callback.initialDelayMs,
        timeoutMs: config.callback.timeoutMs,
      },
    }),
    logger,
    settings: {
      pagesMaxWaitSec: config.pages.maxWaitSec,
      workspacePrefix: config.pipeline.workspacePrefix,
    },
  });
}
