/**
 * Log Sink
 *
 * Bounded in-memory buffer of recent log records. The oldest record is
 * evicted once capacity is reached. Consumers (the CLI `logs` view, tests)
 * read it back filtered by minimum severity.
 */

import { isAtLeast, type LogLevel } from './levels.js';

// =============================================================================
// Types
// =============================================================================

export interface LogRecord {
  /** ISO 8601 timestamp */
  readonly timestamp: string;
  readonly level: LogLevel;
  /** Name of the emitting component, e.g. `agent.loop` */
  readonly component: string;
  readonly message: string;
}

export interface LogSinkOptions {
  /** Maximum number of retained records (default: 1000) */
  capacity?: number;
  /** Clock used for record timestamps */
  now?: () => Date;
}

export const DEFAULT_LOG_CAPACITY = 1000;

// =============================================================================
// LogSink Class
// =============================================================================

/**
 * Ring buffer of log records.
 *
 * `emit` is synchronous, so on a single event loop two records can never
 * interleave or tear, no matter how many sessions share the sink.
 *
 * @example
 * ```typescript
 * const sink = new LogSink({ capacity: 500 });
 * sink.emit('info', 'agent.loop', 'Dispatching tool retrieve_related_papers');
 *
 * for (const record of sink.query('warning')) {
 *   console.log(record.message);
 * }
 * ```
 */
export class LogSink {
  readonly capacity: number;
  private readonly now: () => Date;
  private readonly slots: (LogRecord | undefined)[];
  /** Index of the oldest record */
  private head = 0;
  private count = 0;

  constructor(options: LogSinkOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_LOG_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Log sink capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.now = options.now ?? (() => new Date());
    this.slots = new Array<LogRecord | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Append a record, evicting the oldest one when full.
   */
  emit(level: LogLevel, component: string, message: string): LogRecord {
    const record: LogRecord = Object.freeze({
      timestamp: this.now().toISOString(),
      level,
      component,
      message,
    });

    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = record;
      this.count++;
    } else {
      this.slots[this.head] = record;
      this.head = (this.head + 1) % this.capacity;
    }
    return record;
  }

  /**
   * Records at or above `minLevel`, oldest first.
   *
   * The returned iterable is lazy and restartable: every iteration walks a
   * snapshot taken when that iteration starts, so records emitted while a
   * consumer is reading never show up mid-walk.
   */
  query(minLevel: LogLevel = 'debug'): Iterable<LogRecord> {
    return {
      [Symbol.iterator]: () => {
        const snapshot = this.snapshot();
        return (function* () {
          for (const record of snapshot) {
            if (isAtLeast(record.level, minLevel)) {
              yield record;
            }
          }
        })();
      },
    };
  }

  /**
   * Render matching records as `[timestamp] LEVEL | component | message` lines.
   */
  format(minLevel: LogLevel = 'debug'): string {
    const lines: string[] = [];
    for (const record of this.query(minLevel)) {
      lines.push(formatLogRecord(record));
    }
    return lines.join('\n');
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  private snapshot(): LogRecord[] {
    const records: LogRecord[] = [];
    for (let i = 0; i < this.count; i++) {
      const record = this.slots[(this.head + i) % this.capacity];
      if (record) {
        records.push(record);
      }
    }
    return records;
  }
}

export function formatLogRecord(record: LogRecord): string {
  const level = record.level.toUpperCase().padEnd(8);
  const component = record.component.padEnd(20);
  return `[${record.timestamp}] ${level}| ${component}| ${record.message}`;
}
