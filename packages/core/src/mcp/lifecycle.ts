/**
 * MCP lifecycle handlers (initialize/initialized)
 * @internal
 */

import type { ConciergeConfig } from '../types/public-api.js';
import type {
  JsonRpcRequest,
  InitializeResult,
  ServerCapabilities,
} from './types.js';
import { invalidParams } from './errors.js';

/**
 * MCP Protocol version supported
 */
export const PROTOCOL_VERSION = '2024-11-05';

/**
 * Build server capabilities based on registered tools
 */
export function buildCapabilities(hasTools: boolean): ServerCapabilities {
  const capabilities: ServerCapabilities = {};

  if (hasTools) {
    capabilities.tools = {
      listChanged: false, // Tool set is fixed at start-up
    };
  }

  // Always support logging
  capabilities.logging = {};

  return capabilities;
}

/**
 * Pull the fields the handshake checks out of untyped params
 */
function readInitializeParams(params: unknown): { protocolVersion?: string; clientName?: string } {
  if (typeof params !== 'object' || params === null) return {};
  const protocolVersion = 'protocolVersion' in params && typeof params.protocolVersion === 'string'
    ? params.protocolVersion
    : undefined;
  const clientInfo = 'clientInfo' in params ? params.clientInfo : undefined;
  const clientName = typeof clientInfo === 'object' && clientInfo !== null &&
    'name' in clientInfo && typeof clientInfo.name === 'string'
    ? clientInfo.name
    : undefined;
  return { protocolVersion, clientName };
}

/**
 * Handle initialize request
 *
 * Performs MCP protocol handshake and returns server capabilities.
 */
export function handleInitialize(
  request: JsonRpcRequest,
  config: ConciergeConfig,
  hasTools: boolean
): Response {
  const params = readInitializeParams(request.params);

  // Validate required params
  if (!params.protocolVersion) {
    return invalidParams(request.id, {
      message: 'protocolVersion is required',
    });
  }

  if (!params.clientName) {
    return invalidParams(request.id, {
      message: 'clientInfo.name is required',
    });
  }

  // Check protocol version compatibility
  // Accept 2024-xx-xx and 2025-xx-xx versions for forward compatibility
  if (!/^20(24|25)-/.test(params.protocolVersion)) {
    return invalidParams(request.id, {
      message: `Unsupported protocol version: ${params.protocolVersion}. Expected 2024-xx-xx or 2025-xx-xx format.`,
    });
  }

  const result: InitializeResult = {
    protocolVersion: PROTOCOL_VERSION,
    capabilities: buildCapabilities(hasTools),
    serverInfo: {
      name: config.mcp.serverName,
      version: config.app.version,
    },
    instructions: config.app.description,
  };

  return jsonResponse(request.id, result);
}

/**
 * Handle initialized notification
 *
 * This is a notification (no response expected) sent by the client
 * after it has processed the initialize response.
 */
export function handleInitialized(_request: JsonRpcRequest): Response | null {
  // Initialized is a notification - no response required
  // We could track session state here if needed
  return null;
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
