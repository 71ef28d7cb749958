/**
 * Assistant bootstrap
 *
 * Builds the process-wide pieces from a Config: the Log Sink and root
 * logger, the literature API clients, the model adapters and the tool
 * registry. Sessions are created from the result and share all of it.
 */

import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModelV1 } from 'ai';
import type { ModelClient } from './agent/model.js';
import { AssistantSession } from './agent/session.js';
import { ArxivClient } from './clients/arxiv.js';
import { CrossRefClient } from './clients/crossref.js';
import { HttpClient, type FetchFn } from './clients/http.js';
import { SemanticScholarClient } from './clients/semantic-scholar.js';
import { getConfig, type Config } from './config.js';
import { AiSdkModelClient } from './llm/ai-sdk-model.js';
import { AiSdkTextGenerator, GeminiImageGenerator, type ImageGenerator } from './llm/generator.js';
import { createLLMProvider } from './llm/provider.js';
import { LogSink } from './logging/sink.js';
import { StructuredLogger } from './observability/logger.js';
import { PromptStore } from './prompts/store.js';
import { registerResearchTools } from './tools/index.js';
import { ToolRegistry } from './tools/registry.js';

export interface AssistantOverrides {
  /** Chat model; built from the config when absent */
  languageModel?: LanguageModelV1;
  imageGenerator?: ImageGenerator;
  fetch?: FetchFn;
  /** Where NDJSON log lines go (default: stderr) */
  logOutput?: (json: string) => void;
}

export interface Assistant {
  config: Config;
  sink: LogSink;
  logger: StructuredLogger;
  registry: ToolRegistry;
  model: ModelClient;
  /** True when an image model is available to the infographic tool */
  imageGeneration: boolean;
  createSession(name?: string): AssistantSession;
}

/**
 * Image generation always goes to Gemini, whatever the chat provider is
 */
export function createImageGenerator(config: Pick<Config, 'geminiApiKey' | 'imageModel'>): ImageGenerator | undefined {
  if (!config.geminiApiKey) {
    return undefined;
  }
  const google = createGoogleGenerativeAI({ apiKey: config.geminiApiKey });
  return new GeminiImageGenerator(google(config.imageModel));
}

/**
 * @throws Error when the configured provider has no API key
 */
export function createAssistant(config: Config = getConfig(), overrides: AssistantOverrides = {}): Assistant {
  const sink = new LogSink({ capacity: config.logBufferSize });
  const logger = new StructuredLogger({
    name: 'assistant',
    minLevel: config.logLevel,
    sink,
    ...(overrides.logOutput ? { output: overrides.logOutput } : {}),
  });

  const languageModel =
    overrides.languageModel ??
    createLLMProvider({ provider: config.provider, model: config.model, apiKey: config.apiKey });
  const imageGenerator = overrides.imageGenerator ?? createImageGenerator(config);
  if (!imageGenerator) {
    logger.info('Image generation disabled: GEMINI_API_KEY is not set');
  }

  const http = new HttpClient({ fetch: overrides.fetch, timeoutMs: config.requestTimeoutMs });

  const registry = new ToolRegistry();
  registerResearchTools(registry, {
    generator: new AiSdkTextGenerator(languageModel),
    imageGenerator,
    prompts: new PromptStore({
      dir: config.promptsDir,
      refresh: config.promptRefresh,
      logger: logger.child('prompts'),
    }),
    arxiv: new ArxivClient(http),
    semanticScholar: new SemanticScholarClient(http),
    crossref: new CrossRefClient(http),
    logger,
    settings: config,
  });

  const model = new AiSdkModelClient(languageModel);
  logger.info(`Assistant ready with ${registry.size} tools`, { provider: config.provider });

  return {
    config,
    sink,
    logger,
    registry,
    model,
    imageGeneration: imageGenerator !== undefined,
    createSession: (name) =>
      new AssistantSession(model, registry, logger, {
        name,
        maxIterations: config.maxIterations,
        maxArgumentLength: config.maxArgumentLength,
      }),
  };
}
