/**
 * Agentic Loop Controller
 *
 * Drives one user request to completion: ask the model, run whatever tools
 * it asks for, feed the results back, and repeat until the model answers in
 * plain text or a bound is hit.
 *
 * States: awaiting_model → executing_tools → awaiting_model ... → done | aborted
 */

import {
  IterationLimitExceededError,
  MalformedModelResponseError,
  ProviderError,
  ToolExecutionError,
  errorMessage,
  isAssistantError,
  toToolFailure,
} from '../errors.js';
import type { StructuredLogger } from '../observability/logger.js';
import type { ToolRegistry } from '../tools/registry.js';
import { boundArguments, DEFAULT_MAX_ARGUMENT_LENGTH } from './arguments.js';
import type {
  Attachment,
  Conversation,
  ToolArguments,
  ToolCallRequest,
  ToolResult,
} from './conversation.js';
import { addUsage, type ModelClient, type ModelResponse, type TokenUsage } from './model.js';

// =============================================================================
// Types
// =============================================================================

export type LoopState = 'awaiting_model' | 'executing_tools' | 'done' | 'aborted';

export type LoopStatus = 'done' | 'aborted' | 'failed';

export type AbortReason = 'malformed_response' | 'iteration_limit' | 'provider_error';

export interface AgentStep {
  type: 'text' | 'tool_call' | 'tool_result';
  content: string;
  toolName?: string;
  toolArgs?: ToolArguments;
  isError?: boolean;
}

export interface LoopResult {
  status: LoopStatus;
  /** User-facing answer or notice; never empty */
  text: string;
  /** Completed tool-execution rounds */
  iterations: number;
  /** Model round-trips, including the last one */
  modelCalls: number;
  abortReason?: AbortReason;
  /** Internal description of the failure or abort cause */
  error?: string;
  steps: AgentStep[];
  usage?: TokenUsage;
}

export interface LoopDependencies {
  model: ModelClient;
  registry: ToolRegistry;
  logger: StructuredLogger;
}

export interface LoopOptions {
  /** Tool-execution rounds allowed per request (default: 10) */
  maxIterations?: number;
  /** Ceiling for any string argument (default: 50000) */
  maxArgumentLength?: number;
  systemPrompt?: string;
  onStateChange?: (state: LoopState) => void;
}

export interface UserInput {
  text: string;
  attachments?: readonly Attachment[];
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_MAX_ITERATIONS = 10;

export const DEFAULT_SYSTEM_PROMPT = `You are a research assistant with access to tools for finding, explaining and checking academic papers.
Use the tools when they help answer the request, and say what you found in plain language.
When a tool reports an error, explain the problem or try a different approach instead of repeating the same call.`;

export const MALFORMED_RESPONSE_NOTICE =
  'I encountered an issue processing the function call. Please try rephrasing your request.';

export const ITERATION_LIMIT_NOTICE =
  'I reached the maximum number of tool calls for a single request before finishing. Please narrow the request or ask me to continue.';

export const PROVIDER_FAILURE_NOTICE =
  'The language model could not be reached, so the request was not completed. Please try again in a moment.';

export const EMPTY_RESPONSE_NOTICE = "I processed your request but didn't generate a response.";

export const UNEXPECTED_FAILURE_NOTICE =
  'Something went wrong while processing the request. Please try again.';

// =============================================================================
// Helpers
// =============================================================================

function withNotice(partial: string | undefined, notice: string): string {
  const text = partial?.trim();
  return text ? `${text}\n\n${notice}` : notice;
}

/**
 * Give every call in a batch a distinct id so each result can be matched
 * to exactly one request.
 */
function withUniqueIds(calls: readonly ToolCallRequest[]): ToolCallRequest[] {
  const seen = new Set<string>();
  return calls.map((call, index) => {
    let id = call.id || `call_${index}`;
    while (seen.has(id)) {
      id = `${id}_${index}`;
    }
    seen.add(id);
    return id === call.id ? call : { ...call, id };
  });
}

function describePayload(result: ToolResult): string {
  const { outcome } = result;
  if (outcome.status === 'failure') {
    return outcome.failure.error_message;
  }
  return typeof outcome.payload === 'string' ? outcome.payload : JSON.stringify(outcome.payload);
}

// =============================================================================
// Tool Execution
// =============================================================================

/**
 * Run one call. Never throws: every outcome becomes a ToolResult.
 */
async function executeCall(
  call: ToolCallRequest,
  deps: LoopDependencies
): Promise<ToolResult> {
  const { registry, logger } = deps;
  logger.info(`Dispatching tool ${call.name}`, { callId: call.id });

  try {
    const payload = await registry.dispatch(call.name, call.arguments);
    logger.info(`Tool ${call.name} completed`, { callId: call.id });
    return {
      callId: call.id,
      toolName: call.name,
      arguments: call.arguments,
      outcome: { status: 'success', payload },
    };
  } catch (error) {
    const failure = isAssistantError(error)
      ? error
      : new ToolExecutionError(call.name, errorMessage(error), error);
    logger.warning(`Tool ${call.name} failed: ${failure.message}`, {
      callId: call.id,
      errorType: failure.code,
    });
    return {
      callId: call.id,
      toolName: call.name,
      arguments: call.arguments,
      outcome: { status: 'failure', failure: toToolFailure(failure, call.name) },
    };
  }
}

// =============================================================================
// Loop
// =============================================================================

/**
 * Process one user request against `conversation`.
 *
 * The conversation must be awaiting a user turn. On `done` and `aborted` it
 * ends with a final model turn holding `result.text`. On `failed` the
 * request's turns are rolled back so the caller can retry cleanly.
 *
 * Never throws for model, provider or tool failures.
 */
export async function runAgentLoop(
  conversation: Conversation,
  input: UserInput,
  deps: LoopDependencies,
  options: LoopOptions = {}
): Promise<LoopResult> {
  const {
    maxIterations = DEFAULT_MAX_ITERATIONS,
    maxArgumentLength = DEFAULT_MAX_ARGUMENT_LENGTH,
    systemPrompt = DEFAULT_SYSTEM_PROMPT,
    onStateChange,
  } = options;
  const { model, registry, logger } = deps;

  const steps: AgentStep[] = [];
  let iterations = 0;
  let modelCalls = 0;
  let usage: TokenUsage | undefined;

  const enter = (state: LoopState): void => {
    logger.debug(`Loop state: ${state}`, { iterations });
    onStateChange?.(state);
  };

  const finish = (
    status: LoopStatus,
    text: string,
    extra: { abortReason?: AbortReason; error?: string } = {}
  ): LoopResult => {
    const result: LoopResult = { status, text, iterations, modelCalls, steps, ...extra };
    if (usage) {
      result.usage = usage;
    }
    return result;
  };

  const startLength = conversation.length;
  conversation.addUser(input.text, input.attachments ?? []);
  logger.info('Processing user request', {
    length: input.text.length,
    attachments: input.attachments?.length ?? 0,
  });
  enter('awaiting_model');

  try {
    for (;;) {
      let response: ModelResponse;
      try {
        response = await model.generate({
          system: systemPrompt,
          turns: conversation.turns,
          tools: registry.describeTools(),
        });
      } catch (error) {
        const providerError =
          error instanceof ProviderError ? error : new ProviderError(errorMessage(error), error);
        logger.error(`Model request failed: ${providerError.message}`, { modelCalls });
        conversation.rollback(startLength);
        enter('aborted');
        return finish('failed', PROVIDER_FAILURE_NOTICE, {
          abortReason: 'provider_error',
          error: providerError.message,
        });
      }
      modelCalls++;
      usage = addUsage(usage, response.usage);

      if (response.kind === 'tool_calls' && response.calls.length === 0) {
        response = { kind: 'text', text: response.text ?? '' };
      }

      if (response.kind === 'text') {
        const text = response.text.trim() ? response.text : EMPTY_RESPONSE_NOTICE;
        conversation.addModel(text);
        steps.push({ type: 'text', content: text });
        logger.info(`Final response generated (${text.length} chars)`, { iterations, modelCalls });
        enter('done');
        return finish('done', text);
      }

      if (response.kind === 'malformed') {
        const malformed = new MalformedModelResponseError(response.reason);
        logger.warning(malformed.message, { modelCalls });
        const text = withNotice(response.partialText, MALFORMED_RESPONSE_NOTICE);
        conversation.addModel(text);
        steps.push({ type: 'text', content: text });
        enter('aborted');
        return finish('aborted', text, { abortReason: 'malformed_response', error: malformed.message });
      }

      if (iterations >= maxIterations) {
        const limit = new IterationLimitExceededError(maxIterations);
        logger.warning(`${limit.message}; discarding further tool calls`, {
          requested: response.calls.map((call) => call.name),
        });
        const text = withNotice(response.text, ITERATION_LIMIT_NOTICE);
        conversation.addModel(text);
        steps.push({ type: 'text', content: text });
        enter('aborted');
        return finish('aborted', text, { abortReason: 'iteration_limit', error: limit.message });
      }

      const calls = withUniqueIds(response.calls).map((call) => {
        const bounded = boundArguments(call.arguments, maxArgumentLength);
        for (const cut of bounded.truncated) {
          logger.warning(
            `Truncating argument ${cut.path} of ${call.name} from ${cut.originalLength} to ${maxArgumentLength} chars`
          );
        }
        return { ...call, arguments: bounded.arguments };
      });

      if (response.text) {
        steps.push({ type: 'text', content: response.text });
      }
      conversation.addModel(response.text ?? '', calls);
      enter('executing_tools');

      for (const call of calls) {
        steps.push({
          type: 'tool_call',
          content: `Calling ${call.name}`,
          toolName: call.name,
          toolArgs: call.arguments,
        });
        const result = await executeCall(call, deps);
        conversation.addToolResult(result);
        steps.push({
          type: 'tool_result',
          content: describePayload(result),
          toolName: call.name,
          isError: result.outcome.status === 'failure',
        });
      }

      iterations++;
      enter('awaiting_model');
    }
  } catch (error) {
    // Only reachable through a defect in the loop or conversation bookkeeping
    logger.error(`Unexpected error in agent loop: ${errorMessage(error)}`);
    conversation.rollback(startLength);
    enter('aborted');
    return finish('failed', UNEXPECTED_FAILURE_NOTICE, { error: errorMessage(error) });
  }
}
