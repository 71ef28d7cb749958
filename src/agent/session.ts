/**
 * Assistant session
 *
 * Stateful wrapper around the loop controller: one conversation carried
 * across messages. Sessions share nothing but the registry and the logger,
 * so several can run side by side.
 */

import type { StructuredLogger } from '../observability/logger.js';
import type { ToolRegistry } from '../tools/registry.js';
import { Conversation, type Attachment, type Turn } from './conversation.js';
import { runAgentLoop, type LoopOptions, type LoopResult } from './loop.js';
import type { ModelClient } from './model.js';

export interface SessionOptions extends LoopOptions {
  /** Defaults to `session` */
  name?: string;
}

export class AssistantSession {
  private readonly conversation = new Conversation();
  private readonly logger: StructuredLogger;
  private running = false;

  constructor(
    private readonly model: ModelClient,
    private readonly registry: ToolRegistry,
    logger: StructuredLogger,
    private readonly options: SessionOptions = {}
  ) {
    this.logger = logger.child(options.name ?? 'session');
  }

  /**
   * Send a message and get a response.
   * @throws Error if called while a previous message is still being processed
   */
  async chat(text: string, attachments: readonly Attachment[] = []): Promise<LoopResult> {
    if (this.running) {
      throw new Error('A message is already being processed in this session');
    }
    this.running = true;
    try {
      return await runAgentLoop(
        this.conversation,
        { text, attachments },
        { model: this.model, registry: this.registry, logger: this.logger },
        this.options
      );
    } finally {
      this.running = false;
    }
  }

  clearHistory(): void {
    this.conversation.clear();
    this.logger.debug('Conversation history cleared');
  }

  getHistory(): readonly Turn[] {
    return [...this.conversation.turns];
  }
}
