/**
 * Environment configuration loader with Zod validation
 */

import { z } from 'zod';
import { LogLevelSchema, parseLogLevel } from './logging/levels.js';

export const ProviderSchema = z.enum(['google', 'openrouter']);

export type Provider = z.infer<typeof ProviderSchema>;

/**
 * Configuration schema with validation rules
 */
export const ConfigSchema = z.object({
  provider: ProviderSchema.default('google'),
  /** Chat model id; the provider's default when unset */
  model: z.string().min(1).optional(),
  imageModel: z.string().min(1).default('gemini-2.0-flash-exp'),
  apiKey: z.string().optional(),
  /** Gemini key for image generation, which always goes to Google */
  geminiApiKey: z.string().optional(),
  maxIterations: z.number().int().min(1).max(100).default(10),
  maxArgumentLength: z.number().int().min(100).default(50000),
  logBufferSize: z.number().int().min(1).default(1000),
  logLevel: LogLevelSchema.default('info'),
  maxPdfChars: z.number().int().min(100).default(10000),
  promptsDir: z.string().default('prompts'),
  promptRefresh: z.enum(['always', 'cached']).default('always'),
  infographicsDir: z.string().default('generated_infographics'),
  infographicFallback: z.enum(['summary', 'error']).default('summary'),
  requestTimeoutMs: z.number().int().min(0).default(10000),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse an integer from environment variable string
 */
function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Normalize LLM_PROVIDER. `gemini` is accepted as an alias for `google`.
 */
function parseProvider(value: string | undefined): string | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === 'gemini' ? 'google' : normalized;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const provider = parseProvider(env['LLM_PROVIDER']);
  const openrouter = provider === 'openrouter';
  const apiKey = openrouter ? env['OPENROUTER_API_KEY'] : env['GEMINI_API_KEY'];
  const model = openrouter ? env['OPENROUTER_MODEL'] : env['GEMINI_MODEL_NAME'];
  const logLevel = env['RA_LOG_LEVEL'];

  const rawConfig: Record<string, unknown> = {
    provider,
    model: model || undefined,
    imageModel: env['GEMINI_IMAGE_MODEL_NAME'] || undefined,
    apiKey: apiKey || undefined,
    geminiApiKey: env['GEMINI_API_KEY'] || undefined,
    maxIterations: parseInteger(env['RA_MAX_ITERATIONS']),
    maxArgumentLength: parseInteger(env['RA_MAX_ARGUMENT_LENGTH']),
    logBufferSize: parseInteger(env['RA_LOG_BUFFER_SIZE']),
    // Unknown names are passed through so validation reports them
    logLevel: logLevel ? (parseLogLevel(logLevel) ?? logLevel) : undefined,
    maxPdfChars: parseInteger(env['RA_MAX_PDF_CHARS']),
    promptsDir: env['RA_PROMPTS_DIR'] || undefined,
    promptRefresh: env['RA_PROMPT_REFRESH'] || undefined,
    infographicsDir: env['RA_INFOGRAPHICS_DIR'] || undefined,
    infographicFallback: env['RA_INFOGRAPHIC_FALLBACK'] || undefined,
    requestTimeoutMs: parseInteger(env['RA_REQUEST_TIMEOUT_MS']),
  };

  // Remove undefined values so defaults apply
  const configInput = Object.fromEntries(
    Object.entries(rawConfig).filter(([, v]) => v !== undefined)
  );

  return ConfigSchema.parse(configInput);
}

/**
 * Singleton config instance
 */
let config: Config | null = null;

/**
 * Get the current configuration (singleton)
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Force reload configuration from environment
 */
export function reloadConfig(): Config {
  config = loadConfig();
  return config;
}

/**
 * Reset config singleton (for testing)
 */
export function resetConfig(): void {
  config = null;
}
