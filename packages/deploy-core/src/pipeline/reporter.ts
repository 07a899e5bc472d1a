/**
 * @module @pagesmith/deploy-core/pipeline/reporter
 * Callback delivery with exponential backoff
 */

import type { ResultRecord } from '@pagesmith/api-contracts';
import { discardBody, type FetchLike } from '../ports/http.js';
import { errorMessage, type Logger } from '../logging.js';
import { ErrorCode } from '../utils/errors.js';
import { calculateBackoff, sleep as defaultSleep, type Sleep } from '../utils/backoff.js';
import type { DeliveryOutcome } from './types.js';

export interface ReporterSettings {
  maxRetries: number;
  initialDelayMs: number;
  timeoutMs: number;
}

export interface ReporterDeps {
  logger: Logger;
  settings: ReporterSettings;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
}

export class ResultReporter {
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;

  constructor(private deps: ReporterDeps) {
    this.logger = deps.logger.child({ scope: 'reporter' });
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * POST `record` to `callbackUrl` until a 2xx answer or `maxRetries`
   * attempts. Delays between attempts double from `initialDelayMs`.
   * Never throws.
   */
  async report(callbackUrl: string, record: ResultRecord): Promise<DeliveryOutcome> {
    const { maxRetries, initialDelayMs, timeoutMs } = this.deps.settings;
    const log = this.logger.child({ callbackUrl, taskId: record.taskId });
    const body = JSON.stringify(record);

    let lastStatus: number | undefined;
    let lastError: string | undefined;
    let attempts = 0;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      attempts = attempt + 1;
      try {
        const response = await this.fetchImpl(callbackUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body,
          signal: AbortSignal.timeout(timeoutMs),
        });
        lastStatus = response.status;
        lastError = undefined;
        await discardBody(response);
        if (response.ok) {
          log.info({ attempts }, 'Callback delivered');
          return { delivered: true, attempts, lastStatus };
        }
        log.warn({ attempt: attempts, status: response.status }, 'Callback rejected');
      } catch (error) {
        lastError = errorMessage(error);
        log.warn({ attempt: attempts, error: lastError }, 'Callback request failed');
      }

      if (attempt < maxRetries - 1) {
        const delay = calculateBackoff(attempt, initialDelayMs);
        log.debug({ delayMs: delay }, 'Retrying callback');
        await this.sleep(delay);
      }
    }

    log.error({ code: ErrorCode.DELIVERY_FAILED, attempts, lastStatus, lastError }, 'Callback delivery failed after all retries');
    return { delivered: false, attempts, lastStatus, lastError };
  }
}
