/**
 * Base item store utilities
 * @internal
 */

import type {
  Item,
  ItemKey,
  ItemStore,
  KeyCondition,
  ScanFilter,
} from '../types/public-api.js';

/**
 * Abstract base class for item stores
 *
 * Provides table-name prefixing that concrete stores can extend.
 * Concrete stores must implement the core operations.
 *
 * @internal
 */
export abstract class BaseItemStore implements ItemStore {
  /**
   * Optional table prefix for environment isolation
   */
  protected readonly tablePrefix: string;

  constructor(options?: ItemStoreOptions) {
    this.tablePrefix = options?.tablePrefix ?? '';
  }

  /**
   * Apply the table prefix to a logical table name
   */
  protected tableName(table: string): string {
    return this.tablePrefix ? `${this.tablePrefix}${table}` : table;
  }

  // Abstract methods that concrete stores must implement

  abstract getItem(table: string, key: ItemKey): Promise<Item | null>;

  abstract queryByKey(
    table: string,
    key: KeyCondition,
    indexName?: string
  ): Promise<Item[]>;

  abstract scanWithFilter(table: string, filter?: ScanFilter): Promise<Item[]>;

  abstract putItem(table: string, item: Item): Promise<void>;

  abstract refreshCredentials(): Promise<ItemStore>;
}

/**
 * Options for creating item stores
 * @internal
 */
export interface ItemStoreOptions {
  /** Table prefix for environment isolation */
  tablePrefix?: string;
}
