/**
 * Tools Adapter
 *
 * Converts registry descriptors to Vercel AI SDK tool declarations. The
 * tools carry no `execute`: the SDK only reports the calls, and the loop
 * controller dispatches them through the registry.
 */

import { jsonSchema, tool, type Tool } from 'ai';
import type { ToolDescriptor } from '../tools/registry.js';

/**
 * Convert one descriptor. The schema is passed through without a validator,
 * so argument validation happens in the registry and failures reach the
 * model as tool results.
 */
export function descriptorToAiTool(descriptor: ToolDescriptor): Tool {
  return tool({
    description: descriptor.description,
    parameters: jsonSchema<Record<string, unknown>>(descriptor.inputSchema),
  });
}

export function toAiTools(descriptors: readonly ToolDescriptor[]): Record<string, Tool> {
  const aiTools: Record<string, Tool> = {};
  for (const descriptor of descriptors) {
    aiTools[descriptor.name] = descriptorToAiTool(descriptor);
  }
  return aiTools;
}
