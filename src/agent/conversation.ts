/**
 * Conversation model
 *
 * An ordered, append-only list of frozen turns. Appends that would break the
 * user → model → (tool × N → model)* shape are rejected, so a transcript
 * handed to the model is always well-formed.
 */

import { ConversationOrderError, type ToolFailure } from '../errors.js';
import type { ToolPayload } from '../tools/registry.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A file sent along with a user message
 */
export interface Attachment {
  /** Display name, usually the file's base name */
  name: string;
  /** IANA media type, e.g. `application/pdf` */
  mediaType: string;
  data: Uint8Array | URL;
  /** Local path the file was read from, if any */
  path?: string;
}

export type ToolArguments = Record<string, unknown>;

export interface ToolCallRequest {
  /** Provider call id, or a generated one */
  id: string;
  name: string;
  arguments: ToolArguments;
}

export type ToolOutcome =
  | { status: 'success'; payload: ToolPayload }
  | { status: 'failure'; failure: ToolFailure };

export interface ToolResult {
  callId: string;
  toolName: string;
  /** Arguments as dispatched, after length bounding */
  arguments: ToolArguments;
  outcome: ToolOutcome;
}

export interface UserTurn {
  readonly role: 'user';
  readonly text: string;
  readonly attachments: readonly Attachment[];
}

export interface ModelTurn {
  readonly role: 'model';
  readonly text: string;
  readonly toolCalls: readonly ToolCallRequest[];
}

export interface ToolTurn {
  readonly role: 'tool';
  readonly result: ToolResult;
}

export type Turn = UserTurn | ModelTurn | ToolTurn;

// =============================================================================
// Freezing
// =============================================================================

/**
 * Recursively freeze plain objects and arrays. Binary buffers and URLs are
 * left as they are: typed arrays with elements cannot be frozen.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer || value instanceof URL) {
    return value;
  }
  if (Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }
  return value;
}

// =============================================================================
// Conversation Class
// =============================================================================

export class Conversation {
  private readonly history: Turn[] = [];
  /** Call ids of the last model turn still waiting for a tool turn */
  private pending = new Set<string>();

  get turns(): readonly Turn[] {
    return this.history;
  }

  get length(): number {
    return this.history.length;
  }

  get lastTurn(): Turn | undefined {
    return this.history[this.history.length - 1];
  }

  /**
   * True when the next turn must come from the user: the conversation is
   * empty or ends with a final model answer.
   */
  get awaitingUser(): boolean {
    const last = this.lastTurn;
    return last === undefined || (last.role === 'model' && last.toolCalls.length === 0);
  }

  pendingCallIds(): string[] {
    return [...this.pending];
  }

  addUser(text: string, attachments: readonly Attachment[] = []): UserTurn {
    if (!this.awaitingUser) {
      throw new ConversationOrderError('A user turn can only start a new exchange');
    }
    const turn: UserTurn = { role: 'user', text, attachments: attachments.map((a) => ({ ...a })) };
    return this.push(turn);
  }

  addModel(text: string, toolCalls: readonly ToolCallRequest[] = []): ModelTurn {
    const last = this.lastTurn;
    if (last === undefined || this.awaitingUser) {
      throw new ConversationOrderError('A model turn must follow a user turn or tool results');
    }
    if (this.pending.size > 0) {
      throw new ConversationOrderError(
        `Tool results still pending for: ${this.pendingCallIds().join(', ')}`
      );
    }

    const ids = new Set(toolCalls.map((call) => call.id));
    if (ids.size !== toolCalls.length) {
      throw new ConversationOrderError('Tool call ids within one model turn must be unique');
    }

    const turn: ModelTurn = {
      role: 'model',
      text,
      toolCalls: toolCalls.map((call) => ({ ...call, arguments: { ...call.arguments } })),
    };
    this.pending = ids;
    return this.push(turn);
  }

  addToolResult(result: ToolResult): ToolTurn {
    if (!this.pending.has(result.callId)) {
      throw new ConversationOrderError(
        `No pending tool call with id ${result.callId}`
      );
    }
    this.pending.delete(result.callId);
    return this.push({ role: 'tool', result: { ...result } });
  }

  /**
   * Drop every turn from index `length` on. The remaining prefix must end
   * where a user turn may follow.
   */
  rollback(length: number): void {
    if (length < 0 || length > this.history.length) {
      throw new ConversationOrderError(`Cannot roll back to ${length} of ${this.history.length} turns`);
    }
    const last = this.history[length - 1];
    if (last !== undefined && !(last.role === 'model' && last.toolCalls.length === 0)) {
      throw new ConversationOrderError('Rollback must end at a completed exchange');
    }
    this.history.length = length;
    this.pending = new Set();
  }

  clear(): void {
    this.history.length = 0;
    this.pending = new Set();
  }

  private push<T extends Turn>(turn: T): T {
    const frozen = deepFreeze(turn);
    this.history.push(frozen);
    return frozen;
  }
}
