/**
 * Concierge Server
 *
 * HTTP front of the MCP tool server.
 *
 * @public
 */

import type { Logger } from 'pino';
import type {
  ConciergeConfig,
  ConciergeTool,
  ItemStore,
} from '../types/public-api.js';
import { MCPHandler } from '../mcp/handler.js';
import { createLogger } from '../logging/logger.js';
import { VERSION } from '../version.js';

/**
 * Concierge Server options
 */
export interface ConciergeServerOptions {
  config: ConciergeConfig;
  store: ItemStore;
  /** Root logger (default: a pino logger named after the MCP server) */
  logger?: Logger;
  tools?: ConciergeTool[];
  /** Surface tool exception messages to the caller */
  debugMode?: boolean;
}

/**
 * Concierge Server
 *
 * Routes HTTP requests: CORS preflight, `GET /health`, then JSON-RPC POSTs
 * to the MCP handler.
 *
 * @example
 * ```typescript
 * const server = new ConciergeServer({
 *   config,
 *   store: new InMemoryItemStore(),
 *   tools: createTravelTools({ ... }),
 * });
 *
 * const response = await server.fetch(request);
 * ```
 *
 * @public
 */
export class ConciergeServer {
  /** Concierge version */
  static readonly VERSION = VERSION;

  private config: ConciergeConfig;
  private store: ItemStore;
  private logger: Logger;
  private tools = new Map<string, ConciergeTool>();
  private mcpHandler: MCPHandler;

  constructor(options: ConciergeServerOptions) {
    this.config = options.config;
    this.store = options.store;
    this.logger = options.logger ?? createLogger({ name: options.config.mcp.serverName });

    for (const tool of options.tools ?? []) {
      this.registerTool(tool);
    }

    this.mcpHandler = new MCPHandler({
      config: this.config,
      store: this.store,
      logger: this.logger,
      tools: this.tools,
      debugMode: options.debugMode,
    });
  }

  // ---------------------------------------------------------------------------
  // Tool Registration
  // ---------------------------------------------------------------------------

  /**
   * Register an MCP tool
   *
   * @throws Error if tool with same name already exists
   */
  registerTool(tool: ConciergeTool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  // ---------------------------------------------------------------------------
  // Request Handling
  // ---------------------------------------------------------------------------

  /**
   * Handle incoming HTTP request
   *
   * @param request - Incoming HTTP request
   * @returns HTTP response
   */
  async fetch(request: Request): Promise<Response> {
    const url = new URL(request.url);

    // 1. CORS preflight (always first)
    const corsResponse = this.handleCORS(request);
    if (corsResponse) return corsResponse;

    // 2. Health check endpoint
    if (url.pathname === '/health' && request.method === 'GET') {
      return this.handleHealth();
    }

    // 3. MCP protocol (JSON-RPC POST requests)
    if (request.method === 'POST') {
      const contentType = request.headers.get('Content-Type') ?? '';
      if (contentType.includes('application/json')) {
        return this.mcpHandler.handle(request);
      }
    }

    // 4. Default 404
    return new Response('Not Found', { status: 404 });
  }

  private corsHeaders(allowOrigin: string): Record<string, string> {
    return {
      'Access-Control-Allow-Origin': allowOrigin,
      'Access-Control-Allow-Methods': this.config.cors?.methods?.join(', ') ??
        'GET, POST, OPTIONS',
      'Access-Control-Allow-Headers': this.config.cors?.headers?.join(', ') ??
        'Content-Type, Authorization',
      'Access-Control-Max-Age': String(this.config.cors?.maxAge ?? 86400),
    };
  }

  /**
   * Handle CORS preflight requests
   */
  private handleCORS(request: Request): Response | null {
    if (request.method !== 'OPTIONS') return null;

    const origin = request.headers.get('Origin');
    const allowedOrigins = this.config.cors?.origins ?? ['*'];
    const wildcard = allowedOrigins.includes('*');

    // No Origin header - reject unless wildcard is configured
    if (!origin) {
      return wildcard
        ? new Response(null, { status: 204, headers: this.corsHeaders('*') })
        : new Response(null, { status: 403 });
    }

    if (!wildcard && !allowedOrigins.includes(origin)) {
      return new Response(null, { status: 403 });
    }

    return new Response(null, {
      status: 204,
      headers: this.corsHeaders(wildcard ? '*' : origin),
    });
  }

  /**
   * Handle health check endpoint
   */
  private handleHealth(): Response {
    return new Response(
      JSON.stringify({
        status: 'ok',
        version: VERSION,
        timestamp: new Date().toISOString(),
      }),
      {
        headers: { 'Content-Type': 'application/json' },
      }
    );
  }

  // ---------------------------------------------------------------------------
  // Getters
  // ---------------------------------------------------------------------------

  /**
   * Get all registered tools
   */
  getTools(): ConciergeTool[] {
    return Array.from(this.tools.values());
  }

  /**
   * Get server configuration (read-only copy)
   */
  getConfig(): Readonly<ConciergeConfig> {
    return Object.freeze({ ...this.config });
  }

  /**
   * Get item store
   */
  getStore(): ItemStore {
    return this.store;
  }

  /**
   * Get root logger
   */
  getLogger(): Logger {
    return this.logger;
  }
}
