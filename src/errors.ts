/**
 * Error taxonomy
 *
 * Every failure the agentic loop can meet has a class here. Tool-level
 * failures are converted to a structured payload and handed back to the
 * model; only provider failures end a run, and even those are returned as a
 * result rather than thrown.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const ErrorCode = {
  UNKNOWN_TOOL: 'UnknownTool',
  SCHEMA_VALIDATION: 'SchemaValidation',
  TOOL_EXECUTION: 'ToolExecution',
  MALFORMED_MODEL_RESPONSE: 'MalformedModelResponse',
  ITERATION_LIMIT_EXCEEDED: 'IterationLimitExceeded',
  PROVIDER: 'ProviderError',
  CONVERSATION_ORDER: 'ConversationOrder',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base class for all assistant errors.
 */
export class AssistantError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AssistantError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Plain object for serialization. Never exposes the stack.
   */
  toJSON(): { code: ErrorCode; message: string; details?: unknown } {
    const result: { code: ErrorCode; message: string; details?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.details !== undefined) {
      result.details = this.details;
    }
    return result;
  }
}

// =============================================================================
// Tool Errors
// =============================================================================

/**
 * The model asked for a tool name the registry does not know.
 */
export class UnknownToolError extends AssistantError {
  constructor(
    public readonly toolName: string,
    availableTools: readonly string[] = []
  ) {
    super(
      ErrorCode.UNKNOWN_TOOL,
      `Unknown tool: ${toolName}`,
      availableTools.length > 0 ? { availableTools: [...availableTools] } : undefined
    );
    this.name = 'UnknownToolError';
  }
}

/**
 * Arguments did not match the tool's input schema.
 */
export class SchemaValidationError extends AssistantError {
  constructor(
    public readonly toolName: string,
    public readonly issues: readonly string[]
  ) {
    super(
      ErrorCode.SCHEMA_VALIDATION,
      `Invalid arguments for ${toolName}: ${issues.join('; ')}`,
      { issues: [...issues] }
    );
    this.name = 'SchemaValidationError';
  }
}

/**
 * A tool handler threw. Wraps the original error as `cause`.
 */
export class ToolExecutionError extends AssistantError {
  constructor(
    public readonly toolName: string,
    message: string,
    public override readonly cause?: unknown
  ) {
    super(ErrorCode.TOOL_EXECUTION, message);
    this.name = 'ToolExecutionError';
  }
}

// =============================================================================
// Loop Errors
// =============================================================================

export class MalformedModelResponseError extends AssistantError {
  constructor(reason: string) {
    super(ErrorCode.MALFORMED_MODEL_RESPONSE, `Malformed model response: ${reason}`);
    this.name = 'MalformedModelResponseError';
  }
}

export class IterationLimitExceededError extends AssistantError {
  constructor(public readonly limit: number) {
    super(ErrorCode.ITERATION_LIMIT_EXCEEDED, `Tool-calling iteration limit of ${limit} reached`, {
      limit,
    });
    this.name = 'IterationLimitExceededError';
  }
}

/**
 * The model provider could not be reached or failed outright.
 */
export class ProviderError extends AssistantError {
  constructor(message: string, public override readonly cause?: unknown) {
    super(ErrorCode.PROVIDER, message);
    this.name = 'ProviderError';
  }
}

/**
 * A turn was appended out of order. Always a programming error.
 */
export class ConversationOrderError extends AssistantError {
  constructor(message: string) {
    super(ErrorCode.CONVERSATION_ORDER, message);
    this.name = 'ConversationOrderError';
  }
}

// =============================================================================
// Tool Failure Payload
// =============================================================================

/**
 * What the model sees when a tool call fails.
 */
export interface ToolFailure {
  tool: string;
  error_type: string;
  error_message: string;
  details?: unknown;
}

/**
 * Convert any thrown value into a tool failure payload.
 */
export function toToolFailure(error: unknown, toolName: string): ToolFailure {
  if (error instanceof AssistantError) {
    const failure: ToolFailure = {
      tool: toolName,
      error_type: error.code,
      error_message: error.message,
    };
    if (error.details !== undefined) {
      failure.details = error.details;
    }
    return failure;
  }

  return {
    tool: toolName,
    error_type: ErrorCode.TOOL_EXECUTION,
    error_message: errorMessage(error),
  };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// =============================================================================
// Type Guards
// =============================================================================

export function isAssistantError(error: unknown): error is AssistantError {
  return error instanceof AssistantError;
}
