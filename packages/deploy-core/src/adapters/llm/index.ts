/**
 * @module @pagesmith/deploy-core/adapters/llm
 */

import type { DeployConfig } from '../../config/schema.js';
import type { TextGenerator } from '../../ports/generator.js';
import { AnthropicTextGenerator } from './anthropic.js';
import { OpenAITextGenerator } from './openai.js';
import { StaticTextGenerator } from './static.js';

export { AnthropicTextGenerator, OpenAITextGenerator, StaticTextGenerator };

export function createTextGenerator(config: DeployConfig['llm']): TextGenerator {
  switch (config.provider) {
    case 'openai':
      return new OpenAITextGenerator(config);
    case 'anthropic':
      return new AnthropicTextGenerator(config);
    case 'static':
      return new StaticTextGenerator();
  }
}
