/**
 * @module @pagesmith/deploy-core/ports/provider
 * Hosting provider operations the pipeline needs
 */

export interface RepositoryInfo {
  name: string;
  owner: string;
  htmlUrl: string;
  cloneUrl: string;
}

export interface CreateRepositoryInput {
  name: string;
  description: string;
  private: boolean;
  autoInit: boolean;
}

export interface PagesSource {
  branch: string;
  path: '/' | '/docs';
}

/**
 * Raw answer of the pages endpoint; the publisher decides what counts as success
 */
export interface PagesResponse {
  status: number;
  body: string;
}

export interface RepositorySettings {
  hasPages: boolean;
}

/**
 * Hosting provider port. Methods throw `ProviderError` on transport failures
 * and on unexpected HTTP statuses, except `enablePages`, which only throws on
 * transport failures.
 */
export interface HostingProviderPort {
  /** Account that owns the repositories */
  readonly account: string;

  /**
   * @returns null when the repository does not exist
   */
  getRepository(name: string): Promise<RepositoryInfo | null>;

  deleteRepository(name: string): Promise<void>;

  createRepository(input: CreateRepositoryInput): Promise<RepositoryInfo>;

  enablePages(name: string, source: PagesSource): Promise<PagesResponse>;

  updateRepositorySettings(name: string, settings: RepositorySettings): Promise<void>;

  /**
   * Push URL embedding the credential. Never log it unredacted.
   */
  authenticatedRemoteUrl(name: string): string;
}
