/**
 * Tool Registry
 *
 * Holds tool definitions, resolves each tool's execution policy once at
 * registration, and exposes the JSON schemas the model sees.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { ToolDefinitionSchema } from '../providers/types.js';
import {
  READ_ONLY_PARALLEL_TOOLS,
  STATEFUL_TOOLS,
  type RegisteredTool,
  type ToolDefinition,
  type ToolPolicy,
} from './types.js';

// =============================================================================
// ERRORS
// =============================================================================

/** Arguments parsed as JSON but failed the tool's schema */
export class ToolArgumentError extends ValidationError {
  readonly toolName: string;

  constructor(toolName: string, error: z.ZodError) {
    const detail = error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    super(detail, error.issues.map((i) => i.path.join('.')), { tool: toolName });
    this.name = 'ToolArgumentError';
    this.toolName = toolName;
  }
}

// =============================================================================
// JSON SCHEMA
// =============================================================================

/**
 * Convert a zod schema to the JSON-schema subset tool calling needs.
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const described = (result: Record<string, unknown>): Record<string, unknown> =>
    schema.description ? { ...result, description: schema.description } : result;

  if (schema instanceof z.ZodObject) {
    const properties: Record<string, unknown> = {};
    const required: string[] = [];

    for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      properties[key] = zodToJsonSchema(value);
      if (!value.isOptional()) {
        required.push(key);
      }
    }

    return described({
      type: 'object',
      properties,
      ...(required.length > 0 && { required }),
    });
  }

  if (schema instanceof z.ZodString) return described({ type: 'string' });
  if (schema instanceof z.ZodNumber) {
    return described({ type: schema.isInt ? 'integer' : 'number' });
  }
  if (schema instanceof z.ZodBoolean) return described({ type: 'boolean' });
  if (schema instanceof z.ZodArray) {
    return described({ type: 'array', items: zodToJsonSchema(schema.element) });
  }
  if (schema instanceof z.ZodEnum) {
    return described({ type: 'string', enum: schema.options });
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    const inner = zodToJsonSchema(schema.unwrap());
    return schema.description ? { ...inner, description: schema.description } : inner;
  }
  if (schema instanceof z.ZodDefault) {
    const inner = zodToJsonSchema(schema.removeDefault());
    return schema.description ? { ...inner, description: schema.description } : inner;
  }

  return described({ type: 'string' });
}

// =============================================================================
// REGISTRY
// =============================================================================

export function defaultPolicyFor(name: string): ToolPolicy {
  if (READ_ONLY_PARALLEL_TOOLS.has(name)) return 'read_only';
  if (STATEFUL_TOOLS.has(name)) return 'stateful';
  return 'default';
}

export interface ToolRegistryConfig {
  /** Timeout for tools that declare none */
  defaultTimeoutSec?: number;
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();
  private defaultTimeoutSec: number;

  constructor(config: ToolRegistryConfig = {}) {
    this.defaultTimeoutSec = config.defaultTimeoutSec ?? 120;
  }

  register<T extends z.ZodTypeAny>(tool: ToolDefinition<T>): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }

    this.tools.set(tool.name, {
      name: tool.name,
      description: tool.description,
      policy: tool.policy ?? defaultPolicyFor(tool.name),
      timeoutSec: tool.timeoutSec ?? this.defaultTimeoutSec,
      isCodeTool: tool.isCodeTool ?? false,
      jsonSchema: zodToJsonSchema(tool.parameters),
      invoke: async (args, context) => {
        const parsed = tool.parameters.safeParse(args);
        if (!parsed.success) {
          throw new ToolArgumentError(tool.name, parsed.error);
        }
        return tool.execute(parsed.data, context);
      },
    });
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): string[] {
    return Array.from(this.tools.keys());
  }

  policyOf(name: string): ToolPolicy {
    return this.tools.get(name)?.policy ?? 'default';
  }

  /** Schemas in the function-calling shape, in registration order */
  getSchemas(): ToolDefinitionSchema[] {
    return Array.from(this.tools.values(), (tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.jsonSchema,
      },
    }));
  }
}
