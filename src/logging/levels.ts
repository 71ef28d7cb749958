/**
 * Log levels
 *
 * The four severities used by the assistant, numbered with their RFC 5424
 * priorities. Lower number = more severe.
 */

import { z } from 'zod';

export const LOG_LEVEL_PRIORITY = {
  error: 3,
  warning: 4,
  info: 6,
  debug: 7,
} as const;

export const LogLevelSchema = z.enum(['debug', 'info', 'warning', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Accepts level names in any case, plus the common aliases `warn` and `err`.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  const aliased = normalized === 'warn' ? 'warning' : normalized === 'err' ? 'error' : normalized;
  const result = LogLevelSchema.safeParse(aliased);
  return result.success ? result.data : undefined;
}

/**
 * True when `level` is at least as severe as `minLevel`.
 */
export function isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[minLevel];
}
