/**
 * @concierge/core
 *
 * Stable public API for the Concierge MCP server
 *
 * @packageDocumentation
 */

// Re-export ONLY public API types
export type {
  // Item store
  ItemStore,
  Item,
  ItemKey,
  ItemValue,
  KeyCondition,
  FilterCondition,
  ScanFilter,

  // Configuration
  ConciergeConfig,

  // Tools
  ConciergeTool,
  ToolContext,
  ToolResult,
  ToolContent,
  TextContent,
  ImageContent,
  EmbeddedResource,
  JSONSchema,

  // Validation
  ValidationResult,
  ValidationError,
} from './types/public-api.js';

// Re-export utility namespaces
export { errors, validation } from './utils/index.js';

// Direct utility exports (convenience)
export { createJsonResult } from './utils/errors.js';

// Logging
export {
  createLogger,
  createSilentLogger,
  toPinoLevel,
  type Logger,
  type LoggerOptions,
  type McpLogLevel,
} from './logging/logger.js';

// Re-export version
export { VERSION } from './version.js';

// Re-export main server class
export { ConciergeServer, type ConciergeServerOptions } from './server/index.js';

// Item stores and their failure taxonomy
export {
  InMemoryItemStore,
  DynamoDBItemStore,
  StoreDecimal,
  isStoreDecimal,
  matchesFilter,
  StoreError,
  CredentialExpiredError,
  CredentialsMissingError,
  StoreUnavailableError,
  StoreClientError,
  isCredentialExpired,
  type InMemoryItemStoreOptions,
  type TableSchema,
  type KeySchema,
  type DynamoDBItemStoreOptions,
  type DocumentTransport,
} from './storage/index.js';
