/**
 * @module @pagesmith/deploy-core/artifact/parse
 * Tolerant parser for generation responses
 */

import { normalizeArtifactPath } from './paths.js';
import type { ParsedArtifact } from './types.js';

const HTML_MARKER = /<html/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function htmlOrUnusable(content: string, reason: string): ParsedArtifact {
  if (HTML_MARKER.test(content)) {
    return { kind: 'valid', files: { 'index.html': content }, dropped: [] };
  }
  return { kind: 'unusable', reason };
}

/**
 * Collect string entries with safe paths; everything else is reported as dropped.
 */
export function artifactFromObject(value: unknown): ParsedArtifact {
  if (!isRecord(value)) {
    return { kind: 'unusable', reason: 'response JSON is not an object' };
  }

  const files: Record<string, string> = {};
  const dropped: string[] = [];

  for (const [rawPath, content] of Object.entries(value)) {
    const normalized = normalizeArtifactPath(rawPath);
    if (!normalized || typeof content !== 'string') {
      dropped.push(rawPath);
      continue;
    }
    files[normalized] = content;
  }

  if (Object.keys(files).length === 0) {
    return { kind: 'unusable', reason: 'response contains no usable files' };
  }

  return { kind: 'valid', files, dropped };
}

/**
 * Salvage a path → content object from a model response. The JSON may be
 * wrapped in prose or code fences; the span between the first `{` and the last
 * `}` is tried. Raw HTML is accepted as a single `index.html`.
 */
export function parseArtifactResponse(content: string): ParsedArtifact {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');

  if (start < 0 || end <= start) {
    return htmlOrUnusable(content, 'response contains no JSON object');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.slice(start, end + 1));
  } catch {
    return htmlOrUnusable(content, 'response JSON could not be parsed');
  }

  return artifactFromObject(parsed);
}
