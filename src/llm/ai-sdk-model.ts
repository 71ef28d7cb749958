/**
 * AI SDK model client
 *
 * Implements the loop's ModelClient over `generateText`: one round-trip per
 * call, no automatic tool execution. Maps the SDK's results and errors onto
 * the three response kinds the loop understands.
 */

import {
  InvalidToolArgumentsError,
  NoSuchToolError,
  generateId,
  generateText,
  wrapLanguageModel,
  type CoreMessage,
  type FilePart,
  type LanguageModelV1,
  type TextPart,
  type ToolCallPart,
  type ToolResultPart,
} from 'ai';
import { isPlainObject } from '../agent/arguments.js';
import type { ToolCallRequest, Turn } from '../agent/conversation.js';
import type { ModelClient, ModelRequest, ModelResponse, TokenUsage } from '../agent/model.js';
import { ProviderError, errorMessage } from '../errors.js';
import { toAiTools } from './tools-adapter.js';

type ProviderResult = Awaited<ReturnType<LanguageModelV1['doGenerate']>>;

export interface AiSdkModelClientOptions {
  temperature?: number;
  /** Retries of transient provider errors inside the SDK (default: 2) */
  maxRetries?: number;
}

// =============================================================================
// Message Conversion
// =============================================================================

function userContent(turn: Extract<Turn, { role: 'user' }>): Array<TextPart | FilePart> {
  const parts: Array<TextPart | FilePart> = [];
  for (const attachment of turn.attachments) {
    parts.push({ type: 'file', data: attachment.data, mimeType: attachment.mediaType });
  }

  // Local paths let the model hand the file to path-based tools
  const located = turn.attachments.filter((a) => a.path !== undefined);
  const notes = located.map((a) => `[Attached file: ${a.name} at ${a.path}]`);
  const text = [turn.text, ...notes].filter((s) => s.length > 0).join('\n\n');
  if (text.length > 0) {
    parts.push({ type: 'text', text });
  }
  return parts;
}

/**
 * Convert the conversation to AI SDK core messages. Consecutive tool turns
 * are merged into one tool message.
 */
export function turnsToMessages(turns: readonly Turn[]): CoreMessage[] {
  const messages: CoreMessage[] = [];
  let toolParts: ToolResultPart[] | null = null;

  for (const turn of turns) {
    if (turn.role !== 'tool') {
      toolParts = null;
    }

    switch (turn.role) {
      case 'user':
        messages.push({ role: 'user', content: userContent(turn) });
        break;

      case 'model': {
        const content: Array<TextPart | ToolCallPart> = [];
        if (turn.text) {
          content.push({ type: 'text', text: turn.text });
        }
        for (const call of turn.toolCalls) {
          content.push({
            type: 'tool-call',
            toolCallId: call.id,
            toolName: call.name,
            args: call.arguments,
          });
        }
        messages.push({ role: 'assistant', content });
        break;
      }

      case 'tool': {
        const { result } = turn;
        const part: ToolResultPart =
          result.outcome.status === 'success'
            ? {
                type: 'tool-result',
                toolCallId: result.callId,
                toolName: result.toolName,
                result: result.outcome.payload,
              }
            : {
                type: 'tool-result',
                toolCallId: result.callId,
                toolName: result.toolName,
                result: result.outcome.failure,
                isError: true,
              };
        if (toolParts === null) {
          toolParts = [part];
          messages.push({ role: 'tool', content: toolParts });
        } else {
          toolParts.push(part);
        }
        break;
      }
    }
  }

  return messages;
}

// =============================================================================
// AiSdkModelClient Class
// =============================================================================

export class AiSdkModelClient implements ModelClient {
  constructor(
    private readonly model: LanguageModelV1,
    private readonly options: AiSdkModelClientOptions = {}
  ) {}

  async generate(request: ModelRequest): Promise<ModelResponse> {
    // The provider's own reply, kept for batches the SDK rejects
    const captured: { result?: ProviderResult } = {};
    const model = wrapLanguageModel({
      model: this.model,
      middleware: {
        wrapGenerate: async ({ doGenerate }) => {
          const result = await doGenerate();
          captured.result = result;
          return result;
        },
      },
    });

    try {
      const result = await generateText({
        model,
        system: request.system,
        messages: turnsToMessages(request.turns),
        tools: toAiTools(request.tools),
        maxRetries: this.options.maxRetries ?? 2,
        ...(this.options.temperature !== undefined ? { temperature: this.options.temperature } : {}),
      });

      const usage: TokenUsage = {
        promptTokens: result.usage.promptTokens,
        completionTokens: result.usage.completionTokens,
        totalTokens: result.usage.totalTokens,
      };
      const text = result.text;

      if (result.toolCalls.length > 0) {
        const calls: ToolCallRequest[] = [];
        for (const call of result.toolCalls) {
          const args: unknown = call.args;
          if (!isPlainObject(args)) {
            return withPartial(
              { kind: 'malformed', reason: `arguments for ${call.toolName} are not an object`, usage },
              text
            );
          }
          calls.push({ id: call.toolCallId, name: call.toolName, arguments: args });
        }
        return text ? { kind: 'tool_calls', calls, text, usage } : { kind: 'tool_calls', calls, usage };
      }

      // Gemini's MALFORMED_FUNCTION_CALL surfaces as finish reason 'error'
      if (result.finishReason === 'error') {
        return withPartial({ kind: 'malformed', reason: 'malformed function call', usage }, text);
      }

      return { kind: 'text', text, usage };
    } catch (error) {
      if (NoSuchToolError.isInstance(error)) {
        // Let the registry report the unknown name back to the model
        return providerToolCalls(captured.result, error.toolName);
      }
      if (InvalidToolArgumentsError.isInstance(error)) {
        return { kind: 'malformed', reason: `unparseable arguments for ${error.toolName}` };
      }
      throw new ProviderError(errorMessage(error), error);
    }
  }
}

function withPartial(
  response: Extract<ModelResponse, { kind: 'malformed' }>,
  text: string
): ModelResponse {
  return text.trim() ? { ...response, partialText: text } : response;
}

/**
 * Every call of a step the SDK refused because one name is not declared.
 * Arguments are checked by the registry on dispatch.
 */
export function providerToolCalls(result: ProviderResult | undefined, unknownTool: string): ModelResponse {
  if (!result?.toolCalls?.length) {
    return { kind: 'tool_calls', calls: [{ id: generateId(), name: unknownTool, arguments: {} }] };
  }

  const usage: TokenUsage = {
    promptTokens: result.usage.promptTokens,
    completionTokens: result.usage.completionTokens,
    totalTokens: result.usage.promptTokens + result.usage.completionTokens,
  };
  const text = result.text ?? '';

  const calls: ToolCallRequest[] = [];
  for (const call of result.toolCalls) {
    const args = parseRawArguments(call.args);
    if (args === null) {
      return withPartial({ kind: 'malformed', reason: `unparseable arguments for ${call.toolName}`, usage }, text);
    }
    calls.push({ id: call.toolCallId || generateId(), name: call.toolName, arguments: args });
  }
  return text ? { kind: 'tool_calls', calls, text, usage } : { kind: 'tool_calls', calls, usage };
}

function parseRawArguments(json: string): Record<string, unknown> | null {
  if (json.trim() === '') {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(json);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
