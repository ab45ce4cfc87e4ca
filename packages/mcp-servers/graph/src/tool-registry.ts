/**
 * Tool Registry for Graph Server
 *
 * Tools self-register by calling registerTool() when their module is imported.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { createMcpErrorResponse, createMcpResponse, type McpToolResponse } from '@graphdoc/shared';

export interface ToolDefinition<TInput extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: TInput;
  handler: (input: z.infer<TInput>) => Promise<unknown>;
}

interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  call: (args: unknown) => Promise<unknown>;
}

interface McpToolSchema {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

const registry = new Map<string, RegisteredTool>();

export function registerTool<TInput extends z.ZodTypeAny>(definition: ToolDefinition<TInput>): void {
  if (registry.has(definition.name)) {
    throw new Error(`Tool "${definition.name}" is already registered`);
  }

  registry.set(definition.name, {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    call: async (args) => definition.handler(definition.inputSchema.parse(args)),
  });
}

export function getRegisteredTools(): McpToolSchema[] {
  const tools: McpToolSchema[] = [];

  for (const [, definition] of registry) {
    const jsonSchema = zodToJsonSchema(definition.inputSchema, { $refStrategy: 'none' });

    tools.push({
      name: definition.name,
      description: definition.description,
      inputSchema: Object.fromEntries(Object.entries(jsonSchema).filter(([key]) => key !== '$schema')),
    });
  }

  return tools;
}

/**
 * Get a specific tool by name.
 */
export function getTool(name: string): McpToolSchema | undefined {
  return getRegisteredTools().find(tool => tool.name === name);
}

/**
 * Clear all registered tools (useful for testing).
 */
export function clearRegistry(): void {
  registry.clear();
}

export async function callRegisteredTool(name: string, args: unknown): Promise<McpToolResponse> {
  const definition = registry.get(name);

  if (!definition) {
    return createMcpErrorResponse(new Error(`Unknown tool: ${name}`));
  }

  try {
    return createMcpResponse(await definition.call(args));
  } catch (error) {
    return createMcpErrorResponse(error);
  }
}
