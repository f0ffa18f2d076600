/**
 * Error utilities
 * @internal
 */

import type { ToolResult } from '../types/public-api.js';

/**
 * Create a tool result carrying one JSON document as text
 */
export function createJsonResult(value: unknown, isError = false): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value) }],
    ...(isError && { isError: true }),
  };
}

/**
 * Sanitize error details for LLM consumption
 */
export function sanitizeDetails(details: unknown): Record<string, unknown> {
  if (typeof details !== 'object' || details === null) {
    return {};
  }

  const sanitized: Record<string, unknown> = {};
  const sensitive = ['password', 'secret', 'key', 'token', 'auth', 'credential'];

  for (const [key, value] of Object.entries(details)) {
    const lowerKey = key.toLowerCase();
    if (sensitive.some(s => lowerKey.includes(s))) {
      continue;
    }
    if (typeof value === 'string' && value.includes('/')) {
      // Skip file paths
      continue;
    }
    sanitized[key] = value;
  }

  return sanitized;
}

export const errors = {
  createJsonResult,
  sanitizeDetails,
};
