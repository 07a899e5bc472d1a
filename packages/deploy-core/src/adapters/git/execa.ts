/**
 * @module @pagesmith/deploy-core/adapters/git/execa
 * Execa-based git adapter implementation
 */

import { execa } from 'execa';
import path from 'node:path';
import type { GitExecutionOptions, GitExecutionResult, GitPort } from '../../ports/git.js';

/**
 * Runs the `git` binary. Prompts are disabled so a bad credential fails fast
 * instead of waiting on a terminal.
 */
export class ExecaGitAdapter implements GitPort {
  constructor(
    private defaultTimeoutMs: number,
    private bin: string = 'git'
  ) {}

  async run(args: string[], opts: GitExecutionOptions): Promise<GitExecutionResult> {
    try {
      const result = await execa(this.bin, args, {
        cwd: path.resolve(opts.cwd),
        env: {
          GIT_TERMINAL_PROMPT: '0',
        },
        timeout: opts.timeoutMs ?? this.defaultTimeoutMs,
        reject: false,
      });

      return {
        code: result.exitCode ?? 1,
        stdout: result.stdout,
        stderr: result.stderr,
      };
    } catch (error) {
      // spawn failures (binary missing, bad cwd)
      return {
        code: 1,
        stdout: '',
        stderr: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
