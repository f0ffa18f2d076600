/**
 * Item stores
 * @internal
 */

export { BaseItemStore, type ItemStoreOptions } from './adapter.js';
export { InMemoryItemStore, type InMemoryItemStoreOptions, type TableSchema, type KeySchema } from './in-memory.js';
export {
  DynamoDBItemStore,
  classifyStoreError,
  compileFilter,
  type DynamoDBItemStoreOptions,
  type DocumentTransport,
  type FilterExpressionParts,
} from './dynamodb.js';
export { StoreDecimal, isStoreDecimal } from './decimal.js';
export { matchesFilter, matchesCondition } from './filter.js';
export {
  StoreError,
  CredentialExpiredError,
  CredentialsMissingError,
  StoreUnavailableError,
  StoreClientError,
  isCredentialExpired,
} from './errors.js';
