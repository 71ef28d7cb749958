/**
 * Argument bounding
 *
 * Caps every string inside a tool call's arguments so that no single value
 * handed to a tool exceeds the configured ceiling.
 */

import type { ToolArguments } from './conversation.js';

export const TRUNCATION_MARKER = '\n\n[Truncated due to length...]';

export const DEFAULT_MAX_ARGUMENT_LENGTH = 50000;

export interface BoundedArguments {
  arguments: ToolArguments;
  /** Dotted paths of the values that were cut, with their original lengths */
  truncated: { path: string; originalLength: number }[];
}

/**
 * Cut a string to at most `maxLength` characters. The marker is counted
 * inside the limit; when the limit is too small to hold it the string is cut
 * bare.
 */
export function truncateString(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  if (maxLength <= TRUNCATION_MARKER.length) {
    return value.slice(0, maxLength);
  }
  return value.slice(0, maxLength - TRUNCATION_MARKER.length) + TRUNCATION_MARKER;
}

/**
 * Bound all string values in `args`, recursing into nested objects and
 * arrays. Keys are never dropped and non-string values are copied unchanged,
 * so arguments that passed schema validation before still pass after.
 */
export function boundArguments(args: ToolArguments, maxLength: number): BoundedArguments {
  const truncated: BoundedArguments['truncated'] = [];

  const visit = (value: unknown, path: string): unknown => {
    if (typeof value === 'string') {
      if (value.length > maxLength) {
        truncated.push({ path, originalLength: value.length });
        return truncateString(value, maxLength);
      }
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item, index) => visit(item, `${path}[${index}]`));
    }
    if (isPlainObject(value)) {
      const copy: Record<string, unknown> = {};
      for (const [key, nested] of Object.entries(value)) {
        copy[key] = visit(nested, path ? `${path}.${key}` : key);
      }
      return copy;
    }
    return value;
  };

  const bounded: ToolArguments = {};
  for (const [key, value] of Object.entries(args)) {
    bounded[key] = visit(value, key);
  }
  return { arguments: bounded, truncated };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
