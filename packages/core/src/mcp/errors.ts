/**
 * JSON-RPC error responses
 * @internal
 */

import type { JsonRpcErrorResponse } from './types.js';
import { JSON_RPC_ERROR_CODES } from './types.js';

type RpcId = string | number | null;

/**
 * JSON-RPC errors travel with HTTP 200; the failure is in the body.
 */
function errorResponse(id: RpcId, code: number, message: string, data?: unknown): Response {
  const body: JsonRpcErrorResponse = {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  };
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function withDetail(label: string, detail?: string): string {
  return detail ? `${label}: ${detail}` : label;
}

/** The body was not JSON */
export function parseError(id: RpcId, detail?: string): Response {
  return errorResponse(id, JSON_RPC_ERROR_CODES.PARSE_ERROR, withDetail('Parse error', detail));
}

/** The body was JSON but not a JSON-RPC 2.0 request */
export function invalidRequest(id: RpcId, detail?: string): Response {
  return errorResponse(id, JSON_RPC_ERROR_CODES.INVALID_REQUEST, withDetail('Invalid request', detail));
}

export function methodNotFound(id: RpcId, method: string): Response {
  return errorResponse(id, JSON_RPC_ERROR_CODES.METHOD_NOT_FOUND, `Method not found: ${method}`);
}

/** `data` carries the validation errors, when there are any */
export function invalidParams(id: RpcId, data?: unknown): Response {
  return errorResponse(id, JSON_RPC_ERROR_CODES.INVALID_PARAMS, 'Invalid params', data);
}

export function toolNotFound(id: RpcId, name: string): Response {
  return errorResponse(id, JSON_RPC_ERROR_CODES.TOOL_NOT_FOUND, `Tool not found: ${name}`);
}

export function toolExecutionError(id: RpcId, message: string, data?: unknown): Response {
  return errorResponse(id, JSON_RPC_ERROR_CODES.TOOL_EXECUTION_ERROR, message, data);
}
