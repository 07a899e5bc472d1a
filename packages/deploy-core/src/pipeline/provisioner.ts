/**
 * @module @pagesmith/deploy-core/pipeline/provisioner
 * Repository provisioning: recreate, materialize, commit and push
 */

import { promises as fsp } from 'node:fs';
import path from 'node:path';
import type { HostingProviderPort, RepositoryInfo } from '../ports/provider.js';
import type { GitPort } from '../ports/git.js';
import type { Artifact } from '../artifact/types.js';
import { normalizeArtifactPath, resolveWithin } from '../artifact/paths.js';
import { LICENSE_FILE, README_FILE, renderLicense, renderReadme } from '../artifact/documents.js';
import { errorMessage, type Logger } from '../logging.js';
import { ProviderError } from '../utils/errors.js';
import { redactSecrets } from '../utils/redact.js';
import { sleep as defaultSleep, type Sleep } from '../utils/backoff.js';
import { computePagesUrl, type ProvisionedRepo } from './types.js';

const COMMIT_SHA_PATTERN = /^[0-9a-f]{40}$/;
const DEFAULT_DESCRIPTION = 'LLM-generated app';
const REMOTE = 'origin';

export interface ProvisionerSettings {
  defaultBranch: string;
  pagesDomain: string;
  descriptionMaxLength: number;
  deletePropagationMs: number;
  commitMessage: string;
  gitTimeoutMs: number;
}

export interface ProvisionerDeps {
  provider: HostingProviderPort;
  git: GitPort;
  logger: Logger;
  settings: ProvisionerSettings;
  sleep?: Sleep;
  now?: () => Date;
}

export function truncateDescription(brief: string, maxLength: number): string {
  return brief ? brief.slice(0, maxLength) : DEFAULT_DESCRIPTION;
}

export class RepositoryProvisioner {
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(private deps: ProvisionerDeps) {
    this.logger = deps.logger.child({ scope: 'provisioner' });
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Replace any repository named `taskId`, write the artifact plus LICENSE and
   * README into `workDir`, commit, and push the default branch.
   *
   * @throws ProviderError when a provider call or a git command fails
   */
  async provision(taskId: string, artifact: Artifact, brief: string, workDir: string): Promise<ProvisionedRepo> {
    const log = this.logger.child({ taskId });

    const repository = await this.recreateRepository(taskId, brief, log);
    log.info({ htmlUrl: repository.htmlUrl }, 'Created repository');

    await this.materialize(workDir, repository, artifact, brief, log);
    const commitSha = await this.commitAndPush(workDir, repository, log);

    return {
      htmlUrl: repository.htmlUrl,
      cloneUrl: repository.cloneUrl,
      commitSha,
      remoteName: repository.name,
      owner: repository.owner,
    };
  }

  private async recreateRepository(name: string, brief: string, log: Logger): Promise<RepositoryInfo> {
    const { provider, settings } = this.deps;

    let existing: RepositoryInfo | null = null;
    try {
      existing = await provider.getRepository(name);
    } catch (error) {
      // lookup failures are not fatal; creation decides
      log.warn({ error: errorMessage(error) }, 'Repository lookup failed');
    }

    if (existing) {
      log.warn('Repository already exists, deleting');
      await provider.deleteRepository(name);
      // Deletion is eventually consistent on the provider side
      await this.sleep(settings.deletePropagationMs);
    }

    return provider.createRepository({
      name,
      description: truncateDescription(brief, settings.descriptionMaxLength),
      private: false,
      autoInit: false,
    });
  }

  private async materialize(
    workDir: string,
    repository: RepositoryInfo,
    artifact: Artifact,
    brief: string,
    log: Logger
  ): Promise<void> {
    const { provider, settings } = this.deps;
    const files: string[] = [];

    for (const [relPath, content] of Object.entries(artifact)) {
      if (normalizeArtifactPath(relPath) === null) {
        log.warn({ file: relPath }, 'Skipping unsafe artifact path');
        continue;
      }
      files.push(relPath);
      const target = resolveWithin(workDir, relPath);
      await fsp.mkdir(path.dirname(target), { recursive: true });
      await fsp.writeFile(target, content, 'utf-8');
      log.debug({ file: relPath }, 'Wrote file');
    }

    const overwritten = files.filter((file) => file === LICENSE_FILE || file === README_FILE);
    if (overwritten.length > 0) {
      log.warn({ files: overwritten }, 'Generated documents replace artifact files');
    }

    const now = this.now();
    await fsp.writeFile(path.join(workDir, LICENSE_FILE), renderLicense(provider.account, now), 'utf-8');
    await fsp.writeFile(
      path.join(workDir, README_FILE),
      renderReadme({
        repoName: repository.name,
        brief,
        pagesUrl: computePagesUrl(provider.account, settings.pagesDomain, repository.name),
        cloneUrl: repository.cloneUrl,
        files,
        generatedAt: now,
      }),
      'utf-8'
    );
  }

  private async commitAndPush(workDir: string, repository: RepositoryInfo, log: Logger): Promise<string> {
    const { provider, settings } = this.deps;
    const account = provider.account;
    const branch = settings.defaultBranch;
    const remoteUrl = provider.authenticatedRemoteUrl(repository.name);
    const secrets = credentialParts(remoteUrl);

    const git = async (args: string[], operation: string): Promise<string> => {
      const result = await this.deps.git.run(args, { cwd: workDir, timeoutMs: settings.gitTimeoutMs });
      if (result.code !== 0) {
        const detail = redactSecrets(result.stderr.trim() || result.stdout.trim() || `exit code ${result.code}`, secrets);
        throw new ProviderError(operation, detail);
      }
      return result.stdout;
    };

    await git(['init'], 'git init');
    await git(['config', 'user.name', account], 'git config');
    await git(['config', 'user.email', `${account}@users.noreply.github.com`], 'git config');
    await git(['checkout', '-b', branch], 'git checkout');
    await git(['add', '.'], 'git add');
    await git(['commit', '-m', settings.commitMessage], 'git commit');

    const commitSha = (await git(['rev-parse', 'HEAD'], 'git rev-parse')).trim();
    if (!COMMIT_SHA_PATTERN.test(commitSha)) {
      throw new ProviderError('git rev-parse', `unexpected commit id "${commitSha}"`);
    }

    await git(['remote', 'add', REMOTE, remoteUrl], 'git remote add');
    await git(['push', '-u', REMOTE, branch], 'git push');

    log.info({ commitSha, branch }, 'Pushed commit');
    return commitSha;
  }
}

/**
 * The remote URL and its userinfo parts, for redaction
 */
function credentialParts(remoteUrl: string): string[] {
  const parts = [remoteUrl];
  if (URL.canParse(remoteUrl)) {
    const url = new URL(remoteUrl);
    parts.push(decodeURIComponent(url.username), decodeURIComponent(url.password));
  }
  return parts.filter((part) => part.length > 0);
}
