/**
 * @module @pagesmith/deploy-api/utils/secret
 */

import { createHash, timingSafeEqual } from 'node:crypto';

const digest = (value: string): Buffer => createHash('sha256').update(value, 'utf8').digest();

/**
 * Constant-time comparison. An empty expected secret matches nothing.
 */
export function secretsMatch(provided: string, expected: string): boolean {
  if (!expected) {
    return false;
  }
  return timingSafeEqual(digest(provided), digest(expected));
}
