/**
 * Package version, reported by `/health` and the MCP handshake default
 */
export const VERSION = '0.1.0';
