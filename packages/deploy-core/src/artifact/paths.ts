/**
 * @module @pagesmith/deploy-core/artifact/paths
 * Artifact path validation
 */

import path from 'node:path';

/** Segments the artifact may not write into; git reads its config and hooks from there */
const RESERVED_SEGMENTS = new Set(['.git']);

/**
 * Normalize an artifact path to a forward-slash relative path, or return null
 * when it is empty, absolute, escapes its root, enters a git directory or
 * carries control characters.
 */
export function normalizeArtifactPath(rawPath: string): string | null {
  if (!rawPath || rawPath.trim() === '') {
    return null;
  }
  if (rawPath.includes('\0') || rawPath.includes('\r') || rawPath.includes('\n')) {
    return null;
  }

  const slashed = rawPath.replace(/\\/g, '/');
  if (slashed.startsWith('/') || /^[A-Za-z]:/.test(slashed)) {
    return null;
  }
  const segments = slashed.split('/');
  if (segments.includes('..')) {
    return null;
  }
  if (segments.some((segment) => RESERVED_SEGMENTS.has(segment.toLowerCase()))) {
    return null;
  }

  const normalized = path.posix.normalize(slashed);
  if (normalized === '.' || normalized.endsWith('/')) {
    return null;
  }

  return normalized;
}

/**
 * Resolve a validated artifact path inside `baseDir`
 */
export function resolveWithin(baseDir: string, relPath: string): string {
  const normalized = normalizeArtifactPath(relPath);
  if (!normalized) {
    throw new Error(`Unsafe artifact path: ${relPath}`);
  }

  const resolvedBase = path.resolve(baseDir);
  const resolved = path.resolve(resolvedBase, normalized);
  if (!resolved.startsWith(resolvedBase + path.sep)) {
    throw new Error(`Path traversal detected: ${relPath}`);
  }

  return resolved;
}
