/**
 * Single-shot generation for tools
 *
 * Tools call the model directly for refinement, ranking, explanation and
 * image generation. These calls never see the conversation or the tool list.
 */

import { generateText, type LanguageModelV1 } from 'ai';
import { ProviderError, errorMessage } from '../errors.js';

export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
  system?: string;
}

export interface TextGenerator {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface GeneratedImage {
  data: Uint8Array;
  mediaType: string;
}

export interface ImageGenerator {
  /**
   * Render an image for `prompt`.
   * @throws Error when the provider returns no image
   */
  generateImage(prompt: string): Promise<GeneratedImage>;
}

// =============================================================================
// AI SDK Implementations
// =============================================================================

export class AiSdkTextGenerator implements TextGenerator {
  constructor(private readonly model: LanguageModelV1) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    try {
      const result = await generateText({
        model: this.model,
        prompt,
        ...(options.system !== undefined ? { system: options.system } : {}),
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
        ...(options.maxTokens !== undefined ? { maxTokens: options.maxTokens } : {}),
      });
      return result.text;
    } catch (error) {
      throw new ProviderError(errorMessage(error), error);
    }
  }
}

/**
 * Image generation through Gemini's multimodal output
 */
export class GeminiImageGenerator implements ImageGenerator {
  constructor(private readonly model: LanguageModelV1) {}

  async generateImage(prompt: string): Promise<GeneratedImage> {
    const result = await generateText({
      model: this.model,
      prompt,
      providerOptions: {
        google: { responseModalities: ['TEXT', 'IMAGE'] },
      },
    });

    const image = result.files.find((file) => file.mimeType.startsWith('image/'));
    if (!image) {
      throw new Error('The model returned no image');
    }
    return { data: image.uint8Array, mediaType: image.mimeType };
  }
}

/**
 * File extension for an image media type
 */
export function imageExtension(mediaType: string): string {
  switch (mediaType) {
    case 'image/jpeg':
      return 'jpg';
    case 'image/webp':
      return 'webp';
    case 'image/gif':
      return 'gif';
    default:
      return 'png';
  }
}
