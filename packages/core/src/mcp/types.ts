/**
 * MCP JSON-RPC types
 * @internal
 */

/**
 * JSON-RPC 2.0 request
 */
export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: string | number | null;
  method: string;
  params?: JsonRpcParams;
}

/**
 * JSON-RPC params with optional MCP metadata
 */
export interface JsonRpcParams {
  _meta?: {
    progressToken?: string;
  };
  [key: string]: unknown;
}

/**
 * JSON-RPC 2.0 error response
 */
export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: string | number | null;
  error: JsonRpcError;
}

/**
 * JSON-RPC error object
 */
export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * Standard JSON-RPC error codes
 */
export const JSON_RPC_ERROR_CODES = {
  // Standard JSON-RPC errors
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,

  // Server-defined range: -32000 to -32099
  TOOL_NOT_FOUND: -32002,
  TOOL_EXECUTION_ERROR: -32006,
} as const;

/**
 * Server capabilities returned in initialize response
 */
export interface ServerCapabilities {
  tools?: {
    listChanged?: boolean;
  };
  logging?: Record<string, never>;
  experimental?: Record<string, unknown>;
}

/**
 * Initialize result
 */
export interface InitializeResult {
  protocolVersion: string;
  capabilities: ServerCapabilities;
  serverInfo: {
    name: string;
    version: string;
  };
  instructions?: string;
}

/**
 * Tools list result
 */
export interface ToolsListResult {
  tools: ToolDefinition[];
}

/**
 * Tool definition for tools/list
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties?: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * Tools call result
 */
export interface ToolsCallResult {
  content: ToolContent[];
  isError?: boolean;
}

/**
 * Tool content item
 */
export interface ToolContent {
  type: 'text' | 'image' | 'resource';
  text?: string;
  data?: string;
  mimeType?: string;
}
