/**
 * Pulling JSON out of model replies
 */

import { z } from 'zod';

/**
 * Strip a surrounding markdown code fence (```json ... ``` or ``` ... ```)
 * and return the inner text. Text without a fence is returned trimmed.
 */
export function extractJsonBlock(text: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/i.exec(text);
  if (fenced?.[1] !== undefined) {
    return fenced[1].trim();
  }
  return text.trim();
}

/**
 * Parse the JSON in a model reply and validate it.
 * Returns undefined when the reply holds no valid value of that shape.
 */
export function parseModelJson<T extends z.ZodTypeAny>(schema: T, text: string): z.infer<T> | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonBlock(text));
  } catch {
    return undefined;
  }
  const result = schema.safeParse(raw);
  return result.success ? result.data : undefined;
}
