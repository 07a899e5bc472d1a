/**
 * @module @pagesmith/deploy-core/utils/redact
 */

/**
 * Replace every occurrence of each secret with `***`. Empty secrets are ignored.
 */
export function redactSecrets(text: string, secrets: readonly string[]): string {
  let result = text;
  for (const secret of secrets) {
    if (secret) {
      result = result.split(secret).join('***');
    }
  }
  return result;
}
