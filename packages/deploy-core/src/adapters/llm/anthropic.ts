/**
 * @module @pagesmith/deploy-core/adapters/llm/anthropic
 * Anthropic messages generator
 */

import Anthropic from '@anthropic-ai/sdk';
import type { TextGenerationRequest, TextGenerator } from '../../ports/generator.js';

export interface AnthropicGeneratorConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export class AnthropicTextGenerator implements TextGenerator {
  readonly name = 'anthropic' as const;
  private client: Anthropic;

  constructor(private config: AnthropicGeneratorConfig, client?: Anthropic) {
    this.client = client ?? new Anthropic({ apiKey: config.apiKey });
  }

  async complete(request: TextGenerationRequest): Promise<string> {
    const response = await this.client.messages.create({
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      system: request.system,
      messages: [{ role: 'user', content: request.prompt }],
    });

    return response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
  }
}
