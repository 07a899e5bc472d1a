/**
 * @module @pagesmith/deploy-core
 * Deployment pipeline, adapters and configuration
 */

export { loadDeployConfig, validateRuntimeConfig, findNearestConfig, mapEnvToConfig, CONFIG_FILENAME } from './config/loader.js';
export type { ConfigDiagnostic, LoadDeployConfigOptions, LoadedDeployConfig } from './config/loader.js';
export { deployConfigSchema, llmProviderSchema } from './config/schema.js';
export type { DeployConfig, DeployConfigInput, LlmProvider } from './config/schema.js';

export { createLogger, createNullLogger, errorMessage } from './logging.js';
export type { Logger, LogLevel, CreateLoggerOptions } from './logging.js';

export * from './utils/errors.js';
export { redactSecrets } from './utils/redact.js';
export { calculateBackoff, sleep, systemClock } from './utils/backoff.js';
export type { Clock, Sleep } from './utils/backoff.js';

export * from './ports/index.js';
export { GitHubRestAdapter } from './adapters/github/rest.js';
export { ExecaGitAdapter } from './adapters/git/execa.js';
export { createTextGenerator, OpenAITextGenerator, AnthropicTextGenerator, StaticTextGenerator } from './adapters/llm/index.js';

export type { Artifact, ArtifactProducer, ArtifactRequest, ArtifactResult, ParsedArtifact } from './artifact/types.js';
export { parseArtifactResponse, artifactFromObject } from './artifact/parse.js';
export { normalizeArtifactPath } from './artifact/paths.js';
export { buildFallbackArtifact, FALLBACK_BRIEF_EXCERPT } from './artifact/fallback.js';
export { GeneratedArtifactProducer } from './artifact/producer.js';

export * from './pipeline/types.js';
export { RepositoryProvisioner } from './pipeline/provisioner.js';
export { Publisher } from './pipeline/publisher.js';
export { ReadinessPoller } from './pipeline/poller.js';
export { ResultReporter } from './pipeline/reporter.js';
export { PipelineOrchestrator } from './pipeline/orchestrator.js';
export type { RunOptions, StageListener } from './pipeline/orchestrator.js';
export { createPipeline } from './pipeline/factory.js';
export type { PipelineOverrides } from './pipeline/factory.js';

export { JobRegistry } from './jobs/registry.js';
export type { JobRegistryStats } from './jobs/registry.js';
export { JobRunner } from './jobs/runner.js';
export type { JobPipeline } from './jobs/runner.js';
