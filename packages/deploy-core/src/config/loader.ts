/**
 * @module @pagesmith/deploy-core/config/loader
 * Layered configuration: defaults → pagesmith.config.json → environment → overrides
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { deployConfigSchema, llmProviderSchema, type DeployConfig, type DeployConfigInput } from './schema.js';

export const CONFIG_FILENAME = 'pagesmith.config.json';

export interface ConfigDiagnostic {
  level: 'error' | 'warn';
  code: string;
  message: string;
}

export interface LoadDeployConfigOptions {
  cwd?: string;
  /** Environment to read. When omitted, `.env` in `cwd` is loaded into `process.env` first. */
  env?: NodeJS.ProcessEnv;
  overrides?: DeployConfigInput;
}

export interface LoadedDeployConfig {
  config: DeployConfig;
  diagnostics: ConfigDiagnostic[];
}

/**
 * Walk up from `startDir` looking for the config file
 */
export async function findNearestConfig(startDir: string): Promise<string | null> {
  let dir = path.resolve(startDir);

  while (true) {
    const candidate = path.join(dir, CONFIG_FILENAME);
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      // keep walking
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

function parseNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

/**
 * Map environment variables onto a config layer. Unset variables are left out
 * so they never mask a value from a lower layer.
 */
export function mapEnvToConfig(env: NodeJS.ProcessEnv): DeployConfigInput {
  const overrides: DeployConfigInput = {};
  const github: NonNullable<DeployConfigInput['github']> = {};
  const llm: NonNullable<DeployConfigInput['llm']> = {};
  const pages: NonNullable<DeployConfigInput['pages']> = {};
  const callback: NonNullable<DeployConfigInput['callback']> = {};

  if (env.PORT) {
    overrides.port = parseNumber(env.PORT);
  }
  if (env.HOST) {
    overrides.host = env.HOST;
  }
  if (env.BASE_PATH) {
    overrides.basePath = env.BASE_PATH;
  }
  if (env.LOG_LEVEL) {
    const level = env.LOG_LEVEL.toLowerCase();
    if (level === 'trace' || level === 'debug' || level === 'info' || level === 'warn' || level === 'error' || level === 'fatal') {
      overrides.logLevel = level;
    }
  }
  if (env.SHARED_SECRET) {
    overrides.sharedSecret = env.SHARED_SECRET;
  }

  if (env.GITHUB_TOKEN) {
    github.token = env.GITHUB_TOKEN;
  }
  if (env.GITHUB_USERNAME) {
    github.username = env.GITHUB_USERNAME;
  }
  if (env.GITHUB_API_URL) {
    github.apiUrl = env.GITHUB_API_URL;
  }
  if (env.PAGES_DOMAIN) {
    github.pagesDomain = env.PAGES_DOMAIN;
  }

  if (env.LLM_PROVIDER) {
    const provider = llmProviderSchema.safeParse(env.LLM_PROVIDER.toLowerCase());
    if (provider.success) {
      llm.provider = provider.data;
    }
  }
  if (env.LLM_API_KEY) {
    llm.apiKey = env.LLM_API_KEY;
  }
  if (env.LLM_MODEL) {
    llm.model = env.LLM_MODEL;
  }

  if (env.PAGES_MAX_WAIT_SEC) {
    pages.maxWaitSec = parseNumber(env.PAGES_MAX_WAIT_SEC);
  }
  if (env.CALLBACK_MAX_RETRIES) {
    callback.maxRetries = parseNumber(env.CALLBACK_MAX_RETRIES);
  }
  if (env.CALLBACK_INITIAL_DELAY_MS) {
    callback.initialDelayMs = parseNumber(env.CALLBACK_INITIAL_DELAY_MS);
  }

  if (Object.keys(github).length > 0) overrides.github = github;
  if (Object.keys(llm).length > 0) overrides.llm = llm;
  if (Object.keys(pages).length > 0) overrides.pages = pages;
  if (Object.keys(callback).length > 0) overrides.callback = callback;

  return overrides;
}

/**
 * Merge two layers; nested sections merge key by key
 */
export function mergeConfigLayers(base: DeployConfigInput, next: DeployConfigInput): DeployConfigInput {
  return {
    ...base,
    ...next,
    github: { ...base.github, ...next.github },
    llm: { ...base.llm, ...next.llm },
    pipeline: { ...base.pipeline, ...next.pipeline },
    pages: { ...base.pages, ...next.pages },
    callback: { ...base.callback, ...next.callback },
    jobs: { ...base.jobs, ...next.jobs },
  };
}

async function readFileLayer(
  cwd: string,
  diagnostics: ConfigDiagnostic[]
): Promise<DeployConfigInput> {
  const configPath = await findNearestConfig(cwd);
  if (!configPath) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(configPath, 'utf-8'));
  } catch (error) {
    diagnostics.push({
      level: 'warn',
      code: 'CONFIG_FILE_UNREADABLE',
      message: `${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    });
    return {};
  }

  const parsed = deployConfigSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.errors) {
      diagnostics.push({
        level: 'error',
        code: 'CONFIG_VALIDATION_ERROR',
        message: `${configPath}: ${issue.path.join('.')}: ${issue.message}`,
      });
    }
    return {};
  }

  return parsed.data;
}

/**
 * Load and validate configuration
 */
export async function loadDeployConfig(
  options: LoadDeployConfigOptions = {}
): Promise<LoadedDeployConfig> {
  const cwd = options.cwd ?? process.cwd();
  const diagnostics: ConfigDiagnostic[] = [];

  let env = options.env;
  if (!env) {
    dotenv.config({ path: path.resolve(cwd, '.env') });
    env = process.env;
  }

  const fileLayer = await readFileLayer(cwd, diagnostics);
  const resolved = [fileLayer, mapEnvToConfig(env), options.overrides ?? {}].reduce(mergeConfigLayers, {});

  const result = deployConfigSchema.safeParse(resolved);
  if (!result.success) {
    const messages = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    for (const message of messages) {
      diagnostics.push({ level: 'error', code: 'CONFIG_VALIDATION_ERROR', message });
    }
    throw new Error(`Invalid configuration: ${messages.join('; ')}`);
  }

  return { config: result.data, diagnostics };
}

/**
 * Settings the service cannot run without. Returns one message per problem.
 */
export function validateRuntimeConfig(config: DeployConfig): string[] {
  const errors: string[] = [];

  if (!config.sharedSecret) {
    errors.push('SHARED_SECRET not configured');
  }
  if (!config.github.token) {
    errors.push('GITHUB_TOKEN not configured');
  }
  if (!config.github.username) {
    errors.push('GITHUB_USERNAME not configured');
  }
  if (config.llm.provider !== 'static' && !config.llm.apiKey) {
    errors.push('LLM_API_KEY not configured');
  }

  return errors;
}
