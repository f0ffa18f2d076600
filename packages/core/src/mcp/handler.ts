/**
 * MCP Protocol Handler
 *
 * Main entry point for handling MCP JSON-RPC requests.
 *
 * @internal
 */

import type { Logger } from 'pino';
import type {
  ConciergeConfig,
  ItemStore,
  ConciergeTool,
} from '../types/public-api.js';
import type { JsonRpcRequest } from './types.js';
import { parseError, invalidRequest, invalidParams, methodNotFound } from './errors.js';
import { handleInitialize, handleInitialized } from './lifecycle.js';
import { handleToolsList, handleToolsCall } from './tools.js';
import { isMcpLogLevel, toPinoLevel, type McpLogLevel } from '../logging/logger.js';

/**
 * MCP Handler options
 */
export interface MCPHandlerOptions {
  config: ConciergeConfig;
  store: ItemStore;
  logger: Logger;
  tools?: Map<string, ConciergeTool>;
  /** Include error messages in tool execution failures */
  debugMode?: boolean;
}

/**
 * MCP Protocol Handler
 *
 * Handles all MCP JSON-RPC requests and routes them to appropriate handlers.
 *
 * @example
 * ```typescript
 * const handler = new MCPHandler({
 *   config,
 *   store: new InMemoryItemStore(),
 *   logger: createLogger(),
 *   tools: myTools,
 * });
 *
 * if (request.method === 'POST') {
 *   return handler.handle(request);
 * }
 * ```
 */
export class MCPHandler {
  private config: ConciergeConfig;
  private store: ItemStore;
  private logger: Logger;
  private tools: Map<string, ConciergeTool>;
  private debugMode: boolean;
  private logLevel: McpLogLevel = 'info';

  constructor(options: MCPHandlerOptions) {
    this.config = options.config;
    this.store = options.store;
    this.logger = options.logger;
    this.tools = options.tools ?? new Map();
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Handle an incoming MCP request
   */
  async handle(request: Request): Promise<Response> {
    // Parse JSON-RPC request
    let parsed: unknown;
    try {
      parsed = await request.json();
    } catch {
      return parseError(null, 'Invalid JSON');
    }

    // Validate JSON-RPC structure
    if (!this.isValidRequest(parsed)) {
      // Try to extract id for error response
      const id = this.extractId(parsed);
      return invalidRequest(id, 'Invalid JSON-RPC 2.0 request');
    }

    return this.route(parsed);
  }

  /**
   * Extract id from a potentially invalid request for error responses
   */
  private extractId(request: unknown): string | number | null {
    if (typeof request !== 'object' || request === null || !('id' in request)) {
      return null;
    }
    const { id } = request;
    if (typeof id === 'string' || typeof id === 'number') {
      return id;
    }
    return null;
  }

  /**
   * Check if request is a notification (no id field per JSON-RPC 2.0)
   */
  private isNotification(request: JsonRpcRequest): boolean {
    return request.id === undefined;
  }

  /**
   * No-response for notifications per JSON-RPC 2.0
   */
  private noContentResponse(): Response {
    return new Response(null, { status: 204 });
  }

  /**
   * Route request to appropriate handler
   */
  private async route(rpcRequest: JsonRpcRequest): Promise<Response> {
    // Per JSON-RPC 2.0: notifications (no id) must not receive a response
    const isNotification = this.isNotification(rpcRequest);

    switch (rpcRequest.method) {
      // Lifecycle
      case 'initialize':
        if (isNotification) {
          return this.noContentResponse();
        }
        return handleInitialize(rpcRequest, this.config, this.tools.size > 0);

      case 'initialized':
      case 'notifications/initialized':
        handleInitialized(rpcRequest);
        return this.noContentResponse();

      // Tools
      case 'tools/list':
        if (isNotification) {
          return this.noContentResponse();
        }
        return handleToolsList(rpcRequest, this.tools);

      case 'tools/call':
        if (isNotification) {
          return this.noContentResponse();
        }
        return handleToolsCall(rpcRequest, this.tools, {
          store: this.store,
          logger: this.logger,
          debugMode: this.debugMode,
        });

      // Logging - can be a notification (side effect: set log level)
      case 'logging/setLevel':
        return this.handleLoggingSetLevel(rpcRequest, isNotification);

      default:
        if (isNotification) {
          return this.noContentResponse();
        }
        return methodNotFound(rpcRequest.id, rpcRequest.method);
    }
  }

  /**
   * Handle logging/setLevel request
   *
   * Changes the level of the live logger, so it applies to every tool call
   * from then on.
   */
  private handleLoggingSetLevel(request: JsonRpcRequest, isNotification: boolean): Response {
    const level = request.params?.['level'];

    if (!isMcpLogLevel(level)) {
      if (isNotification) {
        return this.noContentResponse();
      }
      return invalidParams(request.id, { message: `Unknown log level: ${String(level)}` });
    }

    this.logLevel = level;
    this.logger.level = toPinoLevel(level);

    // Return 204 for notifications, otherwise return result
    if (isNotification) {
      return this.noContentResponse();
    }
    return this.jsonResponse(request.id, {});
  }

  /**
   * Validate JSON-RPC request structure
   */
  private isValidRequest(request: unknown): request is JsonRpcRequest {
    if (typeof request !== 'object' || request === null) {
      return false;
    }

    // Must have jsonrpc: '2.0'
    if (!('jsonrpc' in request) || request.jsonrpc !== '2.0') {
      return false;
    }

    // Must have method as string
    if (!('method' in request) || typeof request.method !== 'string') {
      return false;
    }

    // id can be string, number, or null (for notifications)
    const id = 'id' in request ? request.id : undefined;
    if (
      id !== undefined &&
      id !== null &&
      typeof id !== 'string' &&
      typeof id !== 'number'
    ) {
      return false;
    }

    // params must be object if present
    const params = 'params' in request ? request.params : undefined;
    if (params !== undefined && (typeof params !== 'object' || params === null)) {
      return false;
    }

    return true;
  }

  /**
   * Create JSON-RPC success response
   */
  private jsonResponse(
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

  /**
   * Get current log level
   */
  getLogLevel(): McpLogLevel {
    return this.logLevel;
  }
}
