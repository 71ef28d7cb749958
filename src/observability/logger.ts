/**
 * Structured JSON logging with OpenTelemetry correlation
 *
 * Outputs NDJSON lines with trace correlation and mirrors every emitted
 * record into the in-memory Log Sink, so the CLI can show recent activity.
 */

import { trace, context } from '@opentelemetry/api';
import { isAtLeast, parseLogLevel, type LogLevel } from '../logging/levels.js';
import type { LogSink } from '../logging/sink.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Logger name/component */
  logger?: string;
  /** OpenTelemetry trace ID */
  traceId?: string;
  /** OpenTelemetry span ID */
  spanId?: string;
  /** Additional structured data */
  data?: unknown;
}

export interface StructuredLoggerOptions {
  /** Logger name/component identifier */
  name?: string;
  /** Minimum log level (default: from RA_LOG_LEVEL env or 'info') */
  minLevel?: LogLevel;
  /** Output function (default: console.error, keeping stdout for answers) */
  output?: (json: string) => void;
  /** Sink that receives a copy of every emitted record */
  sink?: LogSink;
}

// =============================================================================
// Helper Functions
// =============================================================================

function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env['RA_LOG_LEVEL'];
  if (envLevel) {
    const level = parseLogLevel(envLevel);
    if (level) {
      return level;
    }
  }
  return 'info';
}

/**
 * Extracts trace context from the current OpenTelemetry span
 */
function getTraceContext(): { traceId?: string; spanId?: string } {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }

  const spanContext = span.spanContext();
  // Zero ids mean "no valid context"
  if (
    spanContext.traceId === '00000000000000000000000000000000' ||
    spanContext.spanId === '0000000000000000'
  ) {
    return {};
  }

  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
  };
}

// =============================================================================
// StructuredLogger Class
// =============================================================================

/**
 * Structured JSON logger with OpenTelemetry trace correlation.
 *
 * @example
 * ```typescript
 * const sink = new LogSink();
 * const logger = new StructuredLogger({ name: 'assistant', sink });
 *
 * logger.info('Session started', { tools: 7 });
 * // stderr: {"timestamp":"...","level":"info","message":"Session started","logger":"assistant","data":{"tools":7}}
 * // sink:   [...] INFO     | assistant           | Session started
 *
 * const loopLogger = logger.child('loop');
 * loopLogger.warning('Iteration limit reached');
 * ```
 */
export class StructuredLogger {
  private readonly name?: string;
  private readonly minLevel: LogLevel;
  private readonly output: (json: string) => void;
  private readonly sink?: LogSink;

  constructor(options: StructuredLoggerOptions = {}) {
    if (options.name !== undefined) {
      this.name = options.name;
    }
    if (options.sink !== undefined) {
      this.sink = options.sink;
    }
    this.minLevel = options.minLevel ?? getDefaultLogLevel();
    this.output = options.output ?? console.error;
  }

  // ===========================================================================
  // Level Checking
  // ===========================================================================

  shouldLog(level: LogLevel): boolean {
    return isAtLeast(level, this.minLevel);
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  getName(): string | undefined {
    return this.name;
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  /**
   * Log a message at the specified level.
   *
   * @param data - Optional structured data; written to the JSON line only,
   *   the sink keeps the plain message
   *
   * The sink receives every record; `minLevel` gates the JSON output only.
   */
  log(level: LogLevel, message: string, data?: unknown): void {
    this.sink?.emit(level, this.name ?? 'root', message);
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (this.name !== undefined) {
      entry.logger = this.name;
    }

    const traceContext = getTraceContext();
    if (traceContext.traceId) {
      entry.traceId = traceContext.traceId;
    }
    if (traceContext.spanId) {
      entry.spanId = traceContext.spanId;
    }

    if (data !== undefined) {
      entry.data = data;
    }

    this.output(JSON.stringify(entry));
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warning(message: string, data?: unknown): void {
    this.log('warning', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  // ===========================================================================
  // Child Loggers
  // ===========================================================================

  /**
   * Create a child logger with an additional name component.
   *
   * The child shares the parent's min level, output function and sink.
   * Names are joined with '.'.
   */
  child(childName: string): StructuredLogger {
    const newName = this.name ? `${this.name}.${childName}` : childName;
    const options: StructuredLoggerOptions = {
      name: newName,
      minLevel: this.minLevel,
      output: this.output,
    };
    if (this.sink) {
      options.sink = this.sink;
    }
    return new StructuredLogger(options);
  }
}

/**
 * Logger that discards everything. Handy default for library callers that
 * don't wire logging.
 */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger({ minLevel: 'error', output: () => {} });
}

export { type LogLevel } from '../logging/levels.js';
