/**
 * @module @pagesmith/deploy-core/utils/backoff
 * Delay helpers shared by the reporter and the readiness poller
 */

/**
 * Exponential delay before retry number `retryIndex` (0-based)
 */
export function calculateBackoff(retryIndex: number, baseDelay: number): number {
  // baseDelay * 2^retryIndex
  return baseDelay * Math.pow(2, retryIndex);
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Milliseconds since an arbitrary origin; injected so tests can drive time. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
