/**
 * @module @pagesmith/deploy-core/ports/git
 * GitPort interface for version-control commands
 */

export interface GitExecutionResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface GitExecutionOptions {
  cwd: string;
  timeoutMs?: number;
}

/**
 * Runs `git` with the given arguments. Non-zero exits are returned, not thrown.
 */
export interface GitPort {
  run(args: string[], opts: GitExecutionOptions): Promise<GitExecutionResult>;
}
