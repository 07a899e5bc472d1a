/**
 * @module @pagesmith/deploy-core/pipeline/publisher
 * Static publishing of a pushed branch
 */

import type { HostingProviderPort } from '../ports/provider.js';
import { errorMessage, type Logger } from '../logging.js';
import { ErrorCode } from '../utils/errors.js';
import { sleep as defaultSleep, type Sleep } from '../utils/backoff.js';
import { computePagesUrl, type PublicationOutcome, type ProvisionedRepo } from './types.js';

/** 201 created, 409 already enabled */
const PAGES_SUCCESS_STATUSES = new Set([201, 409]);

export interface PublisherSettings {
  defaultBranch: string;
  pagesDomain: string;
  settingsPropagationMs: number;
}

export interface PublisherDeps {
  provider: HostingProviderPort;
  logger: Logger;
  settings: PublisherSettings;
  sleep?: Sleep;
}

export class Publisher {
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(private deps: PublisherDeps) {
    this.logger = deps.logger.child({ scope: 'publisher' });
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Enable static publishing for `repo`. Never throws: the pages URL is
   * computed up front and returned whatever the provider answers.
   */
  async publish(repo: ProvisionedRepo): Promise<PublicationOutcome> {
    const { provider, settings } = this.deps;
    const pagesUrl = computePagesUrl(provider.account, settings.pagesDomain, repo.remoteName);
    const log = this.logger.child({ repo: repo.remoteName, pagesUrl });

    try {
      const response = await provider.enablePages(repo.remoteName, { branch: settings.defaultBranch, path: '/' });
      if (PAGES_SUCCESS_STATUSES.has(response.status)) {
        const alreadyEnabled = response.status === 409;
        log.info(alreadyEnabled ? 'Pages already enabled' : 'Pages enabled');
        return { pagesUrl, confirmed: true, method: 'pages-api', alreadyEnabled };
      }
      log.warn({ status: response.status, body: response.body.slice(0, 500) }, 'Pages API rejected the request');
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'Could not enable pages via API');
    }

    try {
      await provider.updateRepositorySettings(repo.remoteName, { hasPages: true });
      await this.sleep(settings.settingsPropagationMs);
      log.warn({ code: ErrorCode.PUBLICATION_UNCONFIRMED }, 'Requested pages through repository settings; enablement not confirmed');
      return { pagesUrl, confirmed: false, method: 'settings-update' };
    } catch (error) {
      log.warn(
        { code: ErrorCode.PUBLICATION_UNCONFIRMED, error: errorMessage(error) },
        'Repository settings fallback failed; pages may need to be enabled manually'
      );
      return { pagesUrl, confirmed: false, method: 'none' };
    }
  }
}
