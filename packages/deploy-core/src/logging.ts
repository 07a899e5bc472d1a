/**
 * @module @pagesmith/deploy-core/logging
 * Structured logging on pino, the logger Fastify is built on
 */

import pino from 'pino';

export type Logger = pino.Logger;
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface CreateLoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Destination stream; defaults to stdout */
  destination?: pino.DestinationStream;
}

const REDACT_PATHS = [
  'token',
  'secret',
  'apiKey',
  '*.token',
  '*.secret',
  '*.apiKey',
  'req.headers.authorization',
  'body.secret',
];

/**
 * Root logger for the process. Components derive children with a `scope` binding.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    name: options.name ?? 'pagesmith',
    level: options.level ?? 'info',
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

/**
 * Silent logger for tests and embedding
 */
export function createNullLogger(): Logger {
  return pino({ level: 'silent' });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
