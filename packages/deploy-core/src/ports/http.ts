/**
 * @module @pagesmith/deploy-core/ports/http
 */

/**
 * Subset of the global `fetch` the pipeline uses; injected so tests can answer in process
 */
export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * Cancel a response body that will not be read, so the connection is released
 * without waiting for garbage collection
 */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}
