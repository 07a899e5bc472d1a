/**
 * @module @pagesmith/deploy-core/utils/errors
 * Error classes and factory functions
 */

import { ErrorCode, httpStatusForCode } from '@pagesmith/api-contracts';

export { ErrorCode };

/**
 * Base error carrying a stable code and the HTTP status it maps to
 */
export class DeployError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = httpStatusForCode(code);
    this.details = details;
  }
}

/**
 * Job descriptor rejected by the front door
 */
export class ValidationError extends DeployError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION, message, details);
  }
}

export class ForbiddenError extends DeployError {
  constructor(message: string) {
    super(ErrorCode.FORBIDDEN, message);
  }
}

export class NotFoundError extends DeployError {
  constructor(resource: string, id?: string) {
    super(ErrorCode.NOT_FOUND, id ? `${resource} not found: ${id}` : `${resource} not found`, { resource, id });
  }
}

/**
 * Unrecoverable failure talking to the hosting provider (REST or git push).
 * Fatal to the job that raised it.
 */
export class ProviderError extends DeployError {
  readonly operation: string;
  readonly status?: number;

  constructor(operation: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(
      ErrorCode.PROVIDER,
      `${operation} failed: ${message}`,
      { operation, status: options?.status },
      { cause: options?.cause }
    );
    this.operation = operation;
    this.status = options?.status;
  }
}

export function isDeployError(error: unknown): error is DeployError {
  return error instanceof DeployError;
}
