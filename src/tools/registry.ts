/**
 * Tool Registration, Lookup and Dispatch
 *
 * Tools are declared with a Zod input schema. The registry validates
 * arguments against it before a handler ever runs, and exports a JSON Schema
 * view of every tool for the model.
 */

import { z } from 'zod';
import { SchemaValidationError, UnknownToolError } from '../errors.js';

// =============================================================================
// JSON Types
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonSchemaTypeName =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'object'
  | 'array'
  | 'null';

/**
 * The JSON Schema subset produced from Zod input schemas
 */
export interface JsonSchema {
  type?: JsonSchemaTypeName;
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  items?: JsonSchema;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
}

// =============================================================================
// Tool Types
// =============================================================================

/**
 * What a tool hands back: plain text or a JSON value
 */
export type ToolPayload = string | JsonValue;

/**
 * Tool definition as written by tool modules
 */
export interface ToolDefinition<S extends z.ZodRawShape = z.ZodRawShape> {
  /** Lowercase identifier with underscores, e.g. `retrieve_related_papers` */
  name: string;
  /** Shown to the model; tells it when to call the tool */
  description: string;
  inputSchema: z.ZodObject<S>;
  handler: (args: z.infer<z.ZodObject<S>>) => Promise<ToolPayload>;
}

/**
 * Handler-free view of a tool, as offered to the model
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: JsonSchema;
}

interface RegisteredTool {
  descriptor: ToolDescriptor;
  invoke: (args: unknown) => Promise<ToolPayload>;
}

// =============================================================================
// Validation Schemas
// =============================================================================

export const ToolNamePattern = /^[a-z][a-z0-9_]*$/;

export const ToolNameSchema = z
  .string()
  .regex(ToolNamePattern, 'Tool name must be lowercase letters, digits and underscores');

/**
 * Format Zod issues as `path: message` strings
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

// =============================================================================
// Tool Registry Class
// =============================================================================

/**
 * Registry for tool definitions
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry();
 * registry.register({
 *   name: 'explain_research_paper',
 *   description: 'Explain a paper in plain language',
 *   inputSchema: z.object({ paper_info: z.string() }),
 *   handler: async ({ paper_info }) => explain(paper_info),
 * });
 *
 * await registry.dispatch('explain_research_paper', { paper_info: 'Attention Is All You Need' });
 * ```
 */
export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();

  /**
   * Register a new tool
   * @throws Error if the name is invalid or taken, or the description is empty
   */
  register<S extends z.ZodRawShape>(tool: ToolDefinition<S>): void {
    const nameValidation = ToolNameSchema.safeParse(tool.name);
    if (!nameValidation.success) {
      throw new Error(`Invalid tool name '${tool.name}': ${formatZodIssues(nameValidation.error).join('; ')}`);
    }

    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }

    if (tool.description.trim() === '') {
      throw new Error(`Tool '${tool.name}' must have a description`);
    }

    const invoke = async (args: unknown): Promise<ToolPayload> => {
      const parsed = tool.inputSchema.safeParse(args);
      if (!parsed.success) {
        throw new SchemaValidationError(tool.name, formatZodIssues(parsed.error));
      }
      return tool.handler(parsed.data);
    };

    this.tools.set(tool.name, {
      descriptor: {
        name: tool.name,
        description: tool.description,
        inputSchema: zodToJsonSchema(tool.inputSchema),
      },
      invoke,
    });
  }

  /**
   * Validate arguments and run the tool.
   *
   * @throws UnknownToolError if no tool has this name
   * @throws SchemaValidationError if required fields are missing or mistyped
   * Errors thrown by the handler propagate unchanged.
   */
  async dispatch(name: string, args: unknown): Promise<ToolPayload> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name, this.names());
    }
    return tool.invoke(args);
  }

  /**
   * Descriptors of all tools, in registration order
   */
  describeTools(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => tool.descriptor);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }
}

// =============================================================================
// Zod to JSON Schema Conversion
// =============================================================================

/**
 * Convert a Zod schema to the JSON Schema subset the model understands.
 * Unsupported Zod types become an unconstrained schema.
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const result = convert(schema);
  if (schema.description !== undefined && result.description === undefined) {
    result.description = schema.description;
  }
  return result;
}

function convert(schema: z.ZodTypeAny): JsonSchema {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return zodToJsonSchema(schema.unwrap());
  }

  if (schema instanceof z.ZodDefault) {
    return zodToJsonSchema(schema.removeDefault());
  }

  if (schema instanceof z.ZodObject) {
    const properties: Record<string, JsonSchema> = {};
    const required: string[] = [];

    for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      properties[key] = zodToJsonSchema(value);
      if (!value.isOptional()) {
        required.push(key);
      }
    }

    const objectSchema: JsonSchema = { type: 'object', properties };
    if (required.length > 0) {
      objectSchema.required = required;
    }
    return objectSchema;
  }

  if (schema instanceof z.ZodString) {
    const stringSchema: JsonSchema = { type: 'string' };
    if (schema.minLength !== null) stringSchema.minLength = schema.minLength;
    if (schema.maxLength !== null) stringSchema.maxLength = schema.maxLength;
    return stringSchema;
  }

  if (schema instanceof z.ZodNumber) {
    const numberSchema: JsonSchema = { type: schema.isInt ? 'integer' : 'number' };
    if (schema.minValue !== null) numberSchema.minimum = schema.minValue;
    if (schema.maxValue !== null) numberSchema.maximum = schema.maxValue;
    return numberSchema;
  }

  if (schema instanceof z.ZodBoolean) {
    return { type: 'boolean' };
  }

  if (schema instanceof z.ZodEnum) {
    return { type: 'string', enum: [...schema.options] };
  }

  if (schema instanceof z.ZodArray) {
    return { type: 'array', items: zodToJsonSchema(schema.element) };
  }

  return {};
}
