import { createJsonResult, type ToolResult } from '@concierge/core';
import type { Envelope, NotFoundResponse } from './types.js';

export function success<T>(response: T): ToolResult {
  const envelope: Envelope<T> = { status: 'success', response };
  return createJsonResult(envelope);
}

export function notFound(message: string): ToolResult {
  return success<NotFoundResponse>({ found: false, message });
}

export function failure(message: string): ToolResult {
  const envelope: Envelope<never> = { status: 'error', response: message };
  return createJsonResult(envelope, true);
}
