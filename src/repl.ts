/**
 * REPL helpers for the CLI
 *
 * Input parsing, attachment loading and result rendering, kept apart from
 * the commander program so they can be imported without starting it.
 */

import { readFile } from 'fs/promises';
import { basename, extname, resolve } from 'path';
import { parse } from 'shell-quote';
import type { Attachment } from './agent/conversation.js';
import type { AgentStep } from './agent/loop.js';
import { parseLogLevel, type LogLevel } from './logging/levels.js';
import type { ToolPayload } from './tools/registry.js';

/**
 * Parse a shell command string into its words.
 * Handles quoted paths like "path with spaces" and 'single quoted'.
 */
export function parseCommand(command: string): string[] {
  const parsed = parse(command);
  // shell-quote returns objects for operators like | > ;
  return parsed.filter((arg): arg is string => typeof arg === 'string');
}

// =============================================================================
// REPL Input
// =============================================================================

export type ReplInput =
  | { kind: 'empty' }
  | { kind: 'message'; text: string }
  | { kind: 'quit' }
  | { kind: 'clear' }
  | { kind: 'tools' }
  | { kind: 'attach'; paths: string[] }
  | { kind: 'logs'; level: LogLevel }
  | { kind: 'invalid'; error: string };

export function parseReplInput(line: string): ReplInput {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: 'empty' };
  }
  if (!trimmed.startsWith('/')) {
    return { kind: 'message', text: trimmed };
  }

  const [command = '', ...args] = parseCommand(trimmed);
  switch (command.toLowerCase()) {
    case '/quit':
    case '/exit':
    case '/q':
      return { kind: 'quit' };
    case '/clear':
      return { kind: 'clear' };
    case '/tools':
      return { kind: 'tools' };
    case '/attach':
      return args.length > 0 ? { kind: 'attach', paths: args } : { kind: 'invalid', error: 'Usage: /attach <path...>' };
    case '/logs': {
      if (args[0] === undefined) {
        return { kind: 'logs', level: 'debug' };
      }
      const level = parseLogLevel(args[0]);
      return level ? { kind: 'logs', level } : { kind: 'invalid', error: `Unknown log level: ${args[0]}` };
    }
    default:
      return { kind: 'invalid', error: `Unknown command: ${command}` };
  }
}

// =============================================================================
// Attachments
// =============================================================================

const MEDIA_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.txt': 'text/plain',
  '.md': 'text/markdown',
};

export function mediaTypeFor(path: string): string {
  return MEDIA_TYPES[extname(path).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Read local files as attachments. The absolute path is kept so the model
 * can hand it to path-based tools.
 */
export async function loadAttachments(
  paths: readonly string[],
  read: (path: string) => Promise<Uint8Array> = (path) => readFile(path)
): Promise<Attachment[]> {
  const attachments: Attachment[] = [];
  for (const path of paths) {
    const absolute = resolve(path);
    attachments.push({
      name: basename(absolute),
      mediaType: mediaTypeFor(absolute),
      data: await read(absolute),
      path: absolute,
    });
  }
  return attachments;
}

// =============================================================================
// Rendering
// =============================================================================

export function renderPayload(payload: ToolPayload): string {
  return typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2);
}

const STEP_PREVIEW_CHARS = 200;

/**
 * One line per tool call or result, for verbose output
 */
export function describeSteps(steps: readonly AgentStep[]): string[] {
  const lines: string[] = [];
  for (const step of steps) {
    if (step.type === 'tool_call') {
      lines.push(`[Tool Call] ${step.toolName ?? 'unknown'} ${JSON.stringify(step.toolArgs ?? {})}`);
    } else if (step.type === 'tool_result') {
      const label = step.isError ? 'Tool Error' : 'Tool Result';
      lines.push(`[${label}] ${step.toolName ?? 'unknown'}: ${step.content.slice(0, STEP_PREVIEW_CHARS)}`);
    }
  }
  return lines;
}
