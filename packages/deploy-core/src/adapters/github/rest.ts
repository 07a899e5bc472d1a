/**
 * @module @pagesmith/deploy-core/adapters/github/rest
 * GitHub REST v3 adapter for the hosting provider port
 */

import { z } from 'zod';
import type { DeployConfig } from '../../config/schema.js';
import type { FetchLike } from '../../ports/http.js';
import type {
  CreateRepositoryInput,
  HostingProviderPort,
  PagesResponse,
  PagesSource,
  RepositoryInfo,
  RepositorySettings,
} from '../../ports/provider.js';
import { ProviderError } from '../../utils/errors.js';
import { errorMessage } from '../../logging.js';

const repositorySchema = z.object({
  name: z.string(),
  html_url: z.string(),
  clone_url: z.string(),
  owner: z.object({ login: z.string() }),
});

export type GitHubConfig = DeployConfig['github'];

export class GitHubRestAdapter implements HostingProviderPort {
  readonly account: string;

  constructor(
    private config: GitHubConfig,
    private fetchImpl: FetchLike = fetch
  ) {
    this.account = config.username;
  }

  async getRepository(name: string): Promise<RepositoryInfo | null> {
    const response = await this.request('get repository', 'GET', this.repoPath(name));
    if (response.status === 404) {
      return null;
    }
    return this.readRepository('get repository', response, [200]);
  }

  async deleteRepository(name: string): Promise<void> {
    const response = await this.request('delete repository', 'DELETE', this.repoPath(name));
    await this.expectStatus('delete repository', response, [204, 404]);
  }

  async createRepository(input: CreateRepositoryInput): Promise<RepositoryInfo> {
    const response = await this.request('create repository', 'POST', '/user/repos', {
      name: input.name,
      description: input.description,
      private: input.private,
      auto_init: input.autoInit,
    });
    return this.readRepository('create repository', response, [201]);
  }

  async enablePages(name: string, source: PagesSource): Promise<PagesResponse> {
    const response = await this.request('enable pages', 'POST', `${this.repoPath(name)}/pages`, {
      source: { branch: source.branch, path: source.path },
    });
    return { status: response.status, body: await response.text() };
  }

  async updateRepositorySettings(name: string, settings: RepositorySettings): Promise<void> {
    const body = { has_pages: settings.hasPages };
    const response = await this.request('update repository settings', 'PATCH', this.repoPath(name), body);
    await this.expectStatus('update repository settings', response, [200]);
  }

  authenticatedRemoteUrl(name: string): string {
    return `https://x-access-token:${this.config.token}@${this.config.gitHost}/${this.account}/${name}.git`;
  }

  private repoPath(name: string): string {
    return `/repos/${encodeURIComponent(this.account)}/${encodeURIComponent(name)}`;
  }

  private async request(
    operation: string,
    method: string,
    pathname: string,
    body?: Record<string, unknown>
  ): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${this.config.token}`,
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': 'pagesmith',
    };
    if (body) {
      headers['Content-Type'] = 'application/json';
    }

    try {
      return await this.fetchImpl(`${this.config.apiUrl.replace(/\/$/, '')}${pathname}`, {
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (error) {
      throw new ProviderError(operation, errorMessage(error), { cause: error });
    }
  }

  private async expectStatus(operation: string, response: Response, accepted: number[]): Promise<void> {
    if (!accepted.includes(response.status)) {
      const text = await response.text().catch(() => '');
      throw new ProviderError(operation, `HTTP ${response.status} ${text}`.trim(), { status: response.status });
    }
  }

  private async readRepository(
    operation: string,
    response: Response,
    accepted: number[]
  ): Promise<RepositoryInfo> {
    await this.expectStatus(operation, response, accepted);

    const payload: unknown = await response.json().catch(() => null);
    const parsed = repositorySchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError(operation, 'unexpected repository payload', { status: response.status });
    }

    return {
      name: parsed.data.name,
      owner: parsed.data.owner.login,
      htmlUrl: parsed.data.html_url,
      cloneUrl: parsed.data.clone_url,
    };
  }
}
