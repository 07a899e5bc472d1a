/**
 * @module @pagesmith/deploy-core/config/schema
 * Zod schema for service and pipeline configuration
 */

import { z } from 'zod';

export const llmProviderSchema = z.enum(['openai', 'anthropic', 'static']);

export const deployConfigSchema = z.object({
  port: z.number().int().positive().default(5000),
  host: z.string().default('0.0.0.0'),
  basePath: z.string().default('/api/v1'),
  apiVersion: z.string().default('1.0.0'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  sharedSecret: z.string().default(''),
  github: z.object({
    token: z.string().default(''),
    username: z.string().default(''),
    apiUrl: z.string().url().default('https://api.github.com'),
    gitHost: z.string().default('github.com'),
    pagesDomain: z.string().default('github.io'),
    defaultBranch: z.string().min(1).default('main'),
    requestTimeoutMs: z.number().int().positive().default(30_000),
  }).default({}),
  llm: z.object({
    provider: llmProviderSchema.default('openai'),
    apiKey: z.string().default(''),
    model: z.string().default('gpt-4'),
    temperature: z.number().min(0).max(2).default(0.7),
    maxTokens: z.number().int().positive().default(4000),
  }).default({}),
  pipeline: z.object({
    descriptionMaxLength: z.number().int().positive().default(100),
    deletePropagationMs: z.number().int().nonnegative().default(2000),
    settingsPropagationMs: z.number().int().nonnegative().default(2000),
    commitMessage: z.string().min(1).default('Initial commit: LLM-generated application'),
    gitTimeoutMs: z.number().int().positive().default(120_000),
    workspacePrefix: z.string().default('pagesmith-'),
  }).default({}),
  pages: z.object({
    maxWaitSec: z.number().nonnegative().default(120),
    pollIntervalMs: z.number().int().positive().default(5000),
    probeTimeoutMs: z.number().int().positive().default(10_000),
  }).default({}),
  callback: z.object({
    maxRetries: z.number().int().positive().default(5),
    initialDelayMs: z.number().int().nonnegative().default(1000),
    timeoutMs: z.number().int().positive().default(30_000),
  }).default({}),
  jobs: z.object({
    ttlSec: z.number().int().positive().default(86_400),
    cleanupIntervalSec: z.number().int().positive().default(300),
  }).default({}),
});

export type DeployConfig = z.infer<typeof deployConfigSchema>;
export type DeployConfigInput = z.input<typeof deployConfigSchema>;
export type LlmProvider = z.infer<typeof llmProviderSchema>;
