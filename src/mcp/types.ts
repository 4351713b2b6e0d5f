import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ResearchOrchestrator } from '../core/orchestrator';

/**
 * Base context passed to all tool handlers
 */
export interface ToolContext {
  orchestrator: ResearchOrchestrator;
  options: {
    disableAccessLog?: boolean;
  };
}

/**
 * Tool handler function signature
 */
export type ToolHandler<TArgs> = (
  args: TArgs,
  context: ToolContext
) => Promise<CallToolResult>;

/** JSON Schema advertised to clients in `tools/list`. */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
}

/**
 * Tool definition with metadata
 */
export interface ToolDefinition<TArgs> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  handler: ToolHandler<TArgs>;
}

/**
 * Helper to create success response
 */
export function successResponse(data: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify({ ok: true, ...data }, null, 2) }],
  };
}

/**
 * Helper to create error response
 */
export function errorResponse(error: unknown, code?: string, details?: Record<string, unknown>): CallToolResult {
  const err = error instanceof Error
    ? { name: error.name, message: error.message }
    : { name: 'UnknownError', message: String(error) };

  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(
          { ok: false, error: { ...err, ...(code ? { code } : {}), ...(details ? { details } : {}) } },
          null,
          2
        ),
      },
    ],
    isError: true,
  };
}
