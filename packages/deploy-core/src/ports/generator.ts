/**
 * @module @pagesmith/deploy-core/ports/generator
 * Text generation service
 */

export interface TextGenerationRequest {
  system: string;
  prompt: string;
}

export interface TextGenerator {
  readonly name: string;
  complete(request: TextGenerationRequest): Promise<string>;
}
