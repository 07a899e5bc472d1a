/**
 * @module @pagesmith/deploy-core/adapters/llm/static
 */

import type { TextGenerator } from '../../ports/generator.js';

/**
 * Generator for running without a model: always answers with nothing usable,
 * so every job gets the fallback app.
 */
export class StaticTextGenerator implements TextGenerator {
  readonly name = 'static' as const;

  async complete(): Promise<string> {
    return '';
  }
}
