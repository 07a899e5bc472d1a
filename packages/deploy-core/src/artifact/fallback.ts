/**
 * @module @pagesmith/deploy-core/artifact/fallback
 * Single-page app substituted when generation is unusable
 */

import { escapeHtml, loadTemplate, renderTemplate } from './templates.js';
import type { Artifact, ArtifactRequest, ArtifactResult } from './types.js';

export const FALLBACK_BRIEF_EXCERPT = 200;

export function buildFallbackArtifact({ taskId, brief }: ArtifactRequest): Artifact {
  // count code points so a surrogate pair is never split
  const excerpt = Array.from(brief).slice(0, FALLBACK_BRIEF_EXCERPT).join('');
  const html = renderTemplate(loadTemplate('fallback.html'), {
    title: escapeHtml(taskId),
    brief: `${escapeHtml(excerpt)}...`,
  });
  return { 'index.html': html };
}

export function fallbackResult(request: ArtifactRequest, reason: string): ArtifactResult {
  return { source: 'fallback', files: buildFallbackArtifact(request), reason };
}
