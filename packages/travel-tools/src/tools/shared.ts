import type { Logger, ToolResult } from '@concierge/core';
import type { z } from 'zod';
import { isTravelError } from '../errors.js';
import { failure } from '../envelope.js';

export type ParsedInput<T> = { ok: true; value: T } | { ok: false; result: ToolResult };

/**
 * Parse tool input into its typed form, or an error envelope naming the
 * first problem.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): ParsedInput<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return { ok: false, result: failure(`Invalid input: ${where}${issue?.message ?? 'unknown error'}`) };
}

/**
 * Turn a thrown error into an error envelope. Caller errors keep their
 * message; everything else is logged and replaced by `systemMessage`.
 */
export function errorResult(error: unknown, logger: Logger, systemMessage: string): ToolResult {
  if (isTravelError(error) && error.kind !== 'system_unavailable') {
    logger.info({ kind: error.kind }, error.message);
    return failure(error.message);
  }
  logger.error({ err: error }, 'Tool failed');
  return failure(systemMessage);
}
