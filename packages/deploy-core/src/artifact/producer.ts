/**
 * @module @pagesmith/deploy-core/artifact/producer
 * Artifact producer backed by a text generator
 */

import type { TextGenerator } from '../ports/generator.js';
import { errorMessage, type Logger } from '../logging.js';
import { ErrorCode } from '../utils/errors.js';
import { fallbackResult } from './fallback.js';
import { parseArtifactResponse } from './parse.js';
import type { ArtifactProducer, ArtifactRequest, ArtifactResult } from './types.js';

export const SYSTEM_PROMPT = 'You are an expert web developer. Generate clean, professional code.';

export function buildPrompt(brief: string): string {
  return `Generate a complete, minimal web application based on this brief:

${brief}

Requirements:
1. Create a single-page application using HTML, CSS, and JavaScript
2. Make it functional and visually appealing
3. Use only vanilla JavaScript (no frameworks)
4. Include all code inline (no external dependencies)
5. Make it responsive and mobile-friendly
6. Keep it simple but professional

Return ONLY a JSON object with this structure:
{
  "index.html": "<complete HTML code with inline CSS and JS>"
}

The HTML must be complete and self-contained: all styles in a <style> tag and all JavaScript in a <script> tag.`;
}

export class GeneratedArtifactProducer implements ArtifactProducer {
  constructor(
    private generator: TextGenerator,
    private logger: Logger
  ) {}

  async produce(request: ArtifactRequest): Promise<ArtifactResult> {
    const log = this.logger.child({ scope: 'producer', taskId: request.taskId, generator: this.generator.name });

    let content: string;
    try {
      content = await this.generator.complete({ system: SYSTEM_PROMPT, prompt: buildPrompt(request.brief) });
    } catch (error) {
      const reason = `generation failed: ${errorMessage(error)}`;
      log.warn({ code: ErrorCode.GENERATION_DEGRADED, reason }, 'Using fallback artifact');
      return fallbackResult(request, reason);
    }

    const parsed = parseArtifactResponse(content);
    if (parsed.kind === 'unusable') {
      log.warn({ code: ErrorCode.GENERATION_DEGRADED, reason: parsed.reason }, 'Using fallback artifact');
      return fallbackResult(request, parsed.reason);
    }

    if (parsed.dropped.length > 0) {
      log.warn({ dropped: parsed.dropped }, 'Dropped unusable artifact entries');
    }
    log.info({ files: Object.keys(parsed.files) }, 'Artifact generated');
    return { source: 'producer', files: parsed.files };
  }
}
