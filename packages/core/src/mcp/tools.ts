/**
 * MCP tools handlers (tools/list, tools/call)
 * @internal
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  ConciergeTool,
  ItemStore,
  ToolContext,
} from '../types/public-api.js';
import type {
  JsonRpcRequest,
  ToolsListResult,
  ToolsCallResult,
  ToolDefinition,
} from './types.js';
import {
  toolNotFound,
  invalidParams,
  toolExecutionError,
} from './errors.js';
import { validateInput } from '../utils/validation.js';
import { sanitizeDetails } from '../utils/errors.js';

/**
 * Dependencies a tool call runs against
 */
export interface ToolCallEnvironment {
  store: ItemStore;
  logger: Logger;
  debugMode: boolean;
}

/**
 * Handle tools/list request
 *
 * Returns a list of all registered tools with their schemas.
 */
export function handleToolsList(
  request: JsonRpcRequest,
  tools: Map<string, ConciergeTool>
): Response {
  const toolDefinitions: ToolDefinition[] = [];

  for (const tool of tools.values()) {
    toolDefinitions.push({
      name: tool.name,
      description: tool.description,
      inputSchema: {
        type: 'object',
        properties: tool.inputSchema.properties,
        required: tool.inputSchema.required,
      },
    });
  }

  const result: ToolsListResult = {
    tools: toolDefinitions,
  };

  return jsonResponse(request.id, result);
}

function readCallParams(params: unknown): { name?: string; args: Record<string, unknown> } {
  if (typeof params !== 'object' || params === null) return { args: {} };
  const name = 'name' in params && typeof params.name === 'string' ? params.name : undefined;
  const raw = 'arguments' in params ? params.arguments : undefined;
  const args: Record<string, unknown> =
    typeof raw === 'object' && raw !== null && !Array.isArray(raw)
      ? Object.fromEntries(Object.entries(raw))
      : {};
  return { name, args };
}

/**
 * Handle tools/call request
 *
 * Executes a tool with the provided arguments.
 */
export async function handleToolsCall(
  request: JsonRpcRequest,
  tools: Map<string, ConciergeTool>,
  environment: ToolCallEnvironment
): Promise<Response> {
  const { name, args } = readCallParams(request.params);

  // Validate required params
  if (!name) {
    return invalidParams(request.id, { message: 'name is required' });
  }

  // Find the tool
  const tool = tools.get(name);
  if (!tool) {
    return toolNotFound(request.id, name);
  }

  // Validate input against schema
  const validationResult = validateInput(args, tool.inputSchema);
  if (!validationResult.valid) {
    return invalidParams(request.id, validationResult.errors);
  }

  const requestId = randomUUID();
  const ctx: ToolContext = {
    store: environment.store,
    logger: environment.logger.child({ requestId, tool: tool.name }),
    debugMode: environment.debugMode,
    requestId,
  };

  // Execute tool
  try {
    const result = await tool.handler(args, ctx);

    // Return result in MCP format
    const mcpResult: ToolsCallResult = {
      content: result.content,
      isError: result.isError,
    };

    return jsonResponse(request.id, mcpResult);
  } catch (error) {
    ctx.logger.error({ err: error }, 'Tool execution failed');
    const message = ctx.debugMode && error instanceof Error
      ? error.message
      : 'Tool execution failed';
    const details = ctx.debugMode && error instanceof Error
      ? sanitizeDetails({ name: error.name, stack: error.stack })
      : undefined;
    return toolExecutionError(request.id, message, details);
  }
}

/**
 * Create a JSON-RPC success response
 */
function jsonResponse(
  id: string | number | null,
  result: unknown
): Response {
  const body = {
    jsonrpc: '2.0',
    id,
    result,
  };

  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}
