import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ToolContext, ToolDefinition, ToolInputSchema } from './types';
import { errorResponse } from './types';

interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  run(args: unknown, context: ToolContext): Promise<CallToolResult>;
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  register<TArgs>(definition: ToolDefinition<TArgs>, schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>): void {
    this.tools.set(definition.name, {
      name: definition.name,
      description: definition.description,
      inputSchema: definition.inputSchema,
      run: (args, context) => definition.handler(schema.parse(args), context),
    });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  async execute(name: string, args: unknown, context: ToolContext): Promise<CallToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return errorResponse(new Error(`Tool '${name}' not found`), 'TOOL_NOT_FOUND');
    }

    try {
      return await tool.run(args, context);
    } catch (error) {
      if (error instanceof z.ZodError) {
        const messages = error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
        return errorResponse(new Error(`Validation failed: ${messages}`), 'VALIDATION_ERROR');
      }
      return errorResponse(error, 'HANDLER_ERROR');
    }
  }

  listTools() {
    return Array.from(this.tools.values()).map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    }));
  }
}
