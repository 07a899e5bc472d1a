/**
 * @module @pagesmith/deploy-core/adapters/llm/openai
 * OpenAI chat completions generator
 */

import OpenAI from 'openai';
import type { TextGenerationRequest, TextGenerator } from '../../ports/generator.js';

export interface OpenAIGeneratorConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export class OpenAITextGenerator implements TextGenerator {
  readonly name = 'openai' as const;
  private client: OpenAI;

  constructor(private config: OpenAIGeneratorConfig, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: config.apiKey });
  }

  async complete(request: TextGenerationRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.config.model,
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
    });

    return response.choices[0]?.message?.content ?? '';
  }
}
