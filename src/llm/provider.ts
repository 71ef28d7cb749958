/**
 * LLM Provider Factory
 *
 * Creates AI SDK language model instances.
 * Default: Google Gemini (GEMINI_API_KEY)
 * Alternative: any OpenRouter model (OPENROUTER_API_KEY)
 */

import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import type { LanguageModelV1 } from 'ai';
import type { Provider } from '../config.js';

export interface LLMConfig {
  provider?: Provider | undefined;
  model?: string | undefined;
  apiKey?: string | undefined;
}

const DEFAULT_GOOGLE_MODEL = 'gemini-2.0-flash';
const DEFAULT_OPENROUTER_MODEL = 'google/gemini-2.0-flash-001';

/**
 * Create a language model for the configured provider
 * @throws Error if the provider needs a key and none is configured
 */
export function createLLMProvider(config: LLMConfig = {}): LanguageModelV1 {
  const provider = config.provider ?? 'google';

  if (provider === 'google') {
    const apiKey = config.apiKey || process.env['GEMINI_API_KEY'];
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY required for the google provider');
    }
    const google = createGoogleGenerativeAI({ apiKey });
    return google(config.model || DEFAULT_GOOGLE_MODEL);
  }

  const apiKey = config.apiKey || process.env['OPENROUTER_API_KEY'];
  if (!apiKey) {
    throw new Error('OPENROUTER_API_KEY required for the openrouter provider');
  }
  const openrouter = createOpenRouter({ apiKey });
  return openrouter(config.model || DEFAULT_OPENROUTER_MODEL);
}

/**
 * Get the default model ID for display
 */
export function getDefaultModelId(provider: Provider = 'google'): string {
  return provider === 'openrouter' ? DEFAULT_OPENROUTER_MODEL : DEFAULT_GOOGLE_MODEL;
}

/**
 * Check which providers have credentials
 */
export function getAvailableProviders(env: NodeJS.ProcessEnv = process.env): Record<Provider, boolean> {
  return {
    google: !!env['GEMINI_API_KEY'],
    openrouter: !!env['OPENROUTER_API_KEY'],
  };
}
