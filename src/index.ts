/**
 * Research Assistant Agent - public exports
 */

// Bootstrap
export { createAssistant, createImageGenerator, type Assistant, type AssistantOverrides } from './bootstrap.js';

// Configuration
export { loadConfig, getConfig, reloadConfig, resetConfig, ConfigSchema, type Config, type Provider } from './config.js';

// Errors
export * from './errors.js';

// Agent
export * from './agent/conversation.js';
export * from './agent/model.js';
export * from './agent/arguments.js';
export * from './agent/loop.js';
export * from './agent/session.js';

// Logging
export * from './logging/levels.js';
export * from './logging/sink.js';
export { StructuredLogger, createSilentLogger, type LogEntry, type StructuredLoggerOptions } from './observability/logger.js';

// LLM
export * from './llm/provider.js';
export * from './llm/ai-sdk-model.js';
export * from './llm/generator.js';
export { extractJsonBlock, parseModelJson } from './llm/json.js';

// Prompts
export * from './prompts/store.js';

// Literature clients
export * from './clients/http.js';
export * from './clients/rate-limiter.js';
export * from './clients/arxiv.js';
export * from './clients/semantic-scholar.js';
export * from './clients/crossref.js';

// Tools
export * from './tools/registry.js';
export { registerResearchTools, type ResearchToolDeps } from './tools/index.js';
