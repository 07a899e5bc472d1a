/**
 * @module @pagesmith/deploy-core/pipeline/poller
 * Fixed-interval readiness polling of a published URL
 */

import { discardBody, type FetchLike } from '../ports/http.js';
import { errorMessage, type Logger } from '../logging.js';
import { ErrorCode } from '../utils/errors.js';
import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from '../utils/backoff.js';

const PROGRESS_EVERY_MS = 15_000;

export interface PollerSettings {
  pollIntervalMs: number;
  probeTimeoutMs: number;
}

export interface PollerDeps {
  logger: Logger;
  settings: PollerSettings;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  clock?: Clock;
}

export class ReadinessPoller {
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly clock: Clock;

  constructor(private deps: PollerDeps) {
    this.logger = deps.logger.child({ scope: 'poller' });
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.sleep = deps.sleep ?? defaultSleep;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Probe `url` until it answers 2xx or `maxWaitSeconds` elapse. Never throws.
   */
  async awaitReady(url: string, maxWaitSeconds: number): Promise<boolean> {
    const log = this.logger.child({ url });
    const maxWaitMs = maxWaitSeconds * 1000;

    try {
      const startedAt = this.clock();
      let nextProgressAt = PROGRESS_EVERY_MS;
      let probes = 0;

      log.info({ maxWaitSeconds }, 'Waiting for pages to be ready');

      while (this.clock() - startedAt < maxWaitMs) {
        probes++;
        if (await this.probe(url)) {
          log.info({ probes, elapsedMs: this.clock() - startedAt }, 'Pages are live');
          return true;
        }

        const elapsed = this.clock() - startedAt;
        if (elapsed >= nextProgressAt) {
          log.info({ elapsedSec: Math.floor(elapsed / 1000) }, 'Still waiting for pages');
          nextProgressAt += PROGRESS_EVERY_MS;
        }

        await this.sleep(this.deps.settings.pollIntervalMs);
      }

      log.warn({ code: ErrorCode.PUBLICATION_UNCONFIRMED, probes, maxWaitSeconds }, 'Pages not ready before timeout');
      return false;
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'Readiness polling aborted');
      return false;
    }
  }

  private async probe(url: string): Promise<boolean> {
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        signal: AbortSignal.timeout(this.deps.settings.probeTimeoutMs),
      });
      await discardBody(response);
      return response.ok;
    } catch (error) {
      this.logger.debug({ url, error: errorMessage(error) }, 'Probe failed');
      return false;
    }
  }
}
