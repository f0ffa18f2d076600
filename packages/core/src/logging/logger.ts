/**
 * Structured logging
 *
 * One root pino logger per server; tool calls log through a child bound to
 * the request id and tool name.
 *
 * @public
 */

import { pino, type DestinationStream, type Level, type LevelWithSilent, type Logger } from 'pino';

export type { Logger };

/**
 * MCP `logging/setLevel` levels (RFC 5424 syslog names)
 */
export type McpLogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

export interface LoggerOptions {
  /** Logger name, printed as `name` on every line */
  name?: string;
  /** Minimum level (default: info) */
  level?: LevelWithSilent;
  /** Where lines go (default: stdout) */
  destination?: DestinationStream;
}

const MCP_TO_PINO: Record<McpLogLevel, Level> = {
  debug: 'debug',
  info: 'info',
  notice: 'info',
  warning: 'warn',
  error: 'error',
  critical: 'fatal',
  alert: 'fatal',
  emergency: 'fatal',
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = {
    name: options.name ?? 'concierge',
    level: options.level ?? 'info',
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

/** Logger that drops everything (tests) */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function toPinoLevel(level: McpLogLevel): Level {
  return MCP_TO_PINO[level];
}

export function isMcpLogLevel(value: unknown): value is McpLogLevel {
  return typeof value === 'string' && Object.hasOwn(MCP_TO_PINO, value);
}
