/**
 * Error codes shared by the HTTP front door and the deployment pipeline.
 * The pipeline uses the `E_PROVIDER` and degraded-outcome codes in log events;
 * only validation, auth and internal codes ever reach an HTTP response.
 */
export enum ErrorCode {
  VALIDATION = 'E_VALIDATION',
  FORBIDDEN = 'E_FORBIDDEN',
  NOT_FOUND = 'E_NOT_FOUND',
  PROVIDER = 'E_PROVIDER',
  GENERATION_DEGRADED = 'E_GENERATION_DEGRADED',
  PUBLICATION_UNCONFIRMED = 'E_PUBLICATION_UNCONFIRMED',
  DELIVERY_FAILED = 'E_DELIVERY_FAILED',
  INTERNAL = 'E_INTERNAL',
}

/**
 * HTTP status for codes that can be surfaced to a caller.
 */
export function httpStatusForCode(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.VALIDATION:
      return 400;
    case ErrorCode.FORBIDDEN:
      return 403;
    case ErrorCode.NOT_FOUND:
      return 404;
    case ErrorCode.PROVIDER:
      return 502;
    default:
      return 500;
  }
}
