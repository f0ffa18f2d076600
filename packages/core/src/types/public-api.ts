/**
 * @packageDocumentation
 * Concierge Core Public API
 *
 * This file defines the stable public API for @concierge/core.
 * Only types and functions exported here are guaranteed to be stable.
 *
 * @version 0.1.0
 */

import type { Logger } from 'pino';
import type { StoreDecimal } from '../storage/decimal.js';

// ============================================================================
// Item Store Abstraction
// ============================================================================

/**
 * Scalar or nested value held in a stored item.
 *
 * Numbers that came from the store keep their full precision as
 * {@link StoreDecimal} until a formatter converts them.
 * @public
 */
export type ItemValue =
  | string
  | number
  | boolean
  | null
  | StoreDecimal
  | ItemValue[]
  | { [attribute: string]: ItemValue };

/**
 * A record as read from or written to a table
 * @public
 */
export type Item = Record<string, ItemValue>;

/**
 * Primary key of an item: partition key, plus sort key where the table has one
 * @public
 */
export type ItemKey = Record<string, string | number>;

/**
 * Equality condition on a single key attribute (partition key of a table or index)
 * @public
 */
export interface KeyCondition {
  attribute: string;
  value: string | number;
}

/**
 * One predicate of a scan filter - discriminated union on `op`
 * @public
 */
export type FilterCondition =
  | { op: 'eq'; attribute: string; value: string | number | boolean }
  | { op: 'contains'; attribute: string; value: string }
  | { op: 'gt'; attribute: string; value: number };

/**
 * Scan filter: every condition must hold (logical AND). Empty matches all.
 * @public
 */
export type ScanFilter = readonly FilterCondition[];

/**
 * Item store interface
 *
 * Implement this interface to put the tools on a different backend.
 * Four operations cover every read and write the tools make:
 *
 * - **getItem:** point read by full primary key
 * - **queryByKey:** all items sharing a partition key, on the table or on
 *   a named secondary index
 * - **scanWithFilter:** full-table scan with a server-side filter
 * - **putItem:** insert or replace by primary key
 *
 * Failures surface as {@link StoreError} subclasses so callers can tell an
 * expired session (refresh and retry) from an outage (give up).
 *
 * @public
 */
export interface ItemStore {
  /**
   * Get an item by primary key
   * @returns The item, or null if not found
   */
  getItem(table: string, key: ItemKey): Promise<Item | null>;

  /**
   * Query by partition key, optionally against a secondary index
   */
  queryByKey(table: string, key: KeyCondition, indexName?: string): Promise<Item[]>;

  /**
   * Scan a table, keeping only items that satisfy every filter condition
   */
  scanWithFilter(table: string, filter?: ScanFilter): Promise<Item[]>;

  /**
   * Insert or replace an item
   */
  putItem(table: string, item: Item): Promise<void>;

  /**
   * Return a store that talks to the same tables with newly resolved
   * credentials. Stores without credentials return themselves.
   */
  refreshCredentials(): Promise<ItemStore>;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Main configuration for Concierge server
 * @public
 */
export interface ConciergeConfig {
  /** Application metadata */
  app: {
    /** Application name */
    name: string;
    /** Application description */
    description: string;
    /** Application version */
    version: string;
  };

  /** MCP protocol configuration */
  mcp: {
    /** Server name for MCP handshake */
    serverName: string;
    /** MCP protocol version */
    protocolVersion: '2024-11-05';
  };

  /** CORS configuration */
  cors?: {
    /** Allowed origins (default: ['*']) */
    origins?: string[];
    /** Allowed HTTP methods (default: GET, POST, OPTIONS) */
    methods?: string[];
    /** Allowed headers (default: Content-Type, Authorization) */
    headers?: string[];
    /** Max age for preflight cache in seconds (default: 86400) */
    maxAge?: number;
  };

  /** Storage configuration */
  storage?: {
    /** Table name prefix for environment isolation (e.g. "staging-") */
    tablePrefix?: string;
  };
}

// ============================================================================
// Tool System
// ============================================================================

/**
 * Tool definition interface
 * @public
 */
export interface ConciergeTool {
  /** Tool name (use a prefix: "travel-customer_lookup") */
  name: string;
  /** Human-readable description */
  description: string;
  /** JSON Schema for input validation */
  inputSchema: JSONSchema;
  /** Tool handler function */
  handler: (input: unknown, ctx: ToolContext) => Promise<ToolResult>;
}

/**
 * Context passed to tool handlers
 * @public
 */
export interface ToolContext {
  /** Item store instance */
  store: ItemStore;
  /** Logger bound to this request */
  logger: Logger;
  /** Whether debug mode is enabled */
  debugMode: boolean;
  /** Request ID for tracing */
  requestId: string;
}

/**
 * Tool execution result
 * @public
 */
export interface ToolResult {
  /** Result content (MCP format) */
  content: ToolContent[];
  /** Whether this is an error result */
  isError?: boolean;
}

/**
 * Text content from a tool
 * @public
 */
export interface TextContent {
  type: 'text';
  text: string;
}

/**
 * Image content from a tool
 * @public
 */
export interface ImageContent {
  type: 'image';
  data: string;
  mimeType: string;
}

/**
 * Embedded resource reference from a tool
 * @public
 */
export interface EmbeddedResource {
  type: 'resource';
  uri: string;
  mimeType?: string;
  text?: string;
}

/**
 * Tool content (MCP format) - discriminated union
 * @public
 */
export type ToolContent = TextContent | ImageContent | EmbeddedResource;

/**
 * JSON Schema definition
 * @public
 */
export interface JSONSchema {
  /** One type, or a list of alternatives */
  type: string | string[];
  properties?: Record<string, JSONSchema>;
  required?: string[];
  items?: JSONSchema;
  enum?: unknown[];
  description?: string;
  default?: unknown;
  [key: string]: unknown;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validation result
 * @public
 */
export interface ValidationResult {
  /** Whether validation passed */
  valid: boolean;
  /** Validation errors (if any) */
  errors?: ValidationError[];
}

/**
 * Validation error
 * @public
 */
export interface ValidationError {
  /** JSON path to invalid field */
  path: string;
  /** Error message */
  message: string;
}
