/**
 * @module @pagesmith/deploy-core/artifact/templates
 * Text templates shipped in the package's templates/ directory
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const cache = new Map<string, string>();

export function loadTemplate(name: string): string {
  const cached = cache.get(name);
  if (cached !== undefined) {
    return cached;
  }

  const file = fileURLToPath(new URL(`../../templates/${name}`, import.meta.url));
  const content = readFileSync(file, 'utf-8');
  cache.set(name, content);
  return content;
}

/**
 * Replace `{{key}}` placeholders. Unknown placeholders are left in place.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] ?? match : match
  );
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
