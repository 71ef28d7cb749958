/**
 * Model boundary
 *
 * The loop talks to the language model only through `ModelClient`. A client
 * returns one of three response shapes; anything it cannot express that way
 * (network failure, auth failure) is thrown as a ProviderError.
 */

import type { ToolDescriptor } from '../tools/registry.js';
import type { ToolCallRequest, Turn } from './conversation.js';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ModelRequest {
  system: string;
  turns: readonly Turn[];
  tools: readonly ToolDescriptor[];
}

export type ModelResponse =
  | { kind: 'text'; text: string; usage?: TokenUsage }
  | { kind: 'tool_calls'; calls: ToolCallRequest[]; text?: string; usage?: TokenUsage }
  | { kind: 'malformed'; reason: string; partialText?: string; usage?: TokenUsage };

export interface ModelClient {
  generate(request: ModelRequest): Promise<ModelResponse>;
}

export function addUsage(total: TokenUsage | undefined, usage: TokenUsage | undefined): TokenUsage | undefined {
  if (!usage) {
    return total;
  }
  if (!total) {
    return { ...usage };
  }
  return {
    promptTokens: total.promptTokens + usage.promptTokens,
    completionTokens: total.completionTokens + usage.completionTokens,
    totalTokens: total.totalTokens + usage.totalTokens,
  };
}
