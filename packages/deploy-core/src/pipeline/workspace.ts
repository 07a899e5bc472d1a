/**
 * @module @pagesmith/deploy-core/pipeline/workspace
 * Per-job working directory with guaranteed cleanup
 */

import { promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { errorMessage, type Logger } from '../logging.js';

/**
 * Create a fresh temporary directory, hand it to `fn`, and remove it on every
 * exit path. A failed removal is logged and does not replace `fn`'s outcome.
 */
export async function withWorkspace<T>(
  prefix: string,
  logger: Logger,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  const dir = await fsp.mkdtemp(path.join(os.tmpdir(), prefix));
  logger.debug({ dir }, 'Created working directory');

  try {
    return await fn(dir);
  } finally {
    try {
      await fsp.rm(dir, { recursive: true, force: true });
    } catch (error) {
      logger.warn({ dir, error: errorMessage(error) }, 'Failed to remove working directory');
    }
  }
}
