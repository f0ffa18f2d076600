/**
 * In-memory item store for testing and local development
 * @internal
 */

import type {
  Item,
  ItemKey,
  ItemStore,
  ItemValue,
  KeyCondition,
  ScanFilter,
} from '../types/public-api.js';
import { BaseItemStore, type ItemStoreOptions } from './adapter.js';
import { isStoreDecimal } from './decimal.js';
import { StoreClientError } from './errors.js';
import { matchesFilter } from './filter.js';

/**
 * Key schema of a table or secondary index
 */
export interface KeySchema {
  partitionKey: string;
  sortKey?: string;
}

/**
 * Table definition: primary key plus named secondary indexes
 */
export interface TableSchema extends KeySchema {
  indexes?: Record<string, KeySchema>;
}

export interface InMemoryItemStoreOptions extends ItemStoreOptions {
  tables?: Record<string, TableSchema>;
}

interface Table {
  schema: TableSchema;
  items: Map<string, Item>;
}

function keyPart(value: ItemValue | undefined): string | null {
  if (typeof value === 'string') return `s:${value}`;
  if (typeof value === 'number') return `n:${value}`;
  if (isStoreDecimal(value)) return `n:${value.toNumber()}`;
  return null;
}

function cloneValue(value: ItemValue): ItemValue {
  if (Array.isArray(value)) return value.map(cloneValue);
  if (value !== null && typeof value === 'object' && !isStoreDecimal(value)) {
    return cloneItem(value);
  }
  // Scalars and decimals are immutable
  return value;
}

function cloneItem(item: Item): Item {
  const copy: Item = {};
  for (const [attribute, value] of Object.entries(item)) {
    copy[attribute] = cloneValue(value);
  }
  return copy;
}

function compareSortValues(a: ItemValue | undefined, b: ItemValue | undefined): number {
  const left = keyPart(a) ?? '';
  const right = keyPart(b) ?? '';
  if (left.startsWith('n:') && right.startsWith('n:')) {
    return Number(left.slice(2)) - Number(right.slice(2));
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * In-memory item store
 *
 * Implements every ItemStore operation over Maps, with per-table key
 * schemas and secondary indexes. Scans return items in insertion order;
 * queries return them ordered by sort key, as a key-value database does.
 *
 * @example
 * ```typescript
 * const store = new InMemoryItemStore({
 *   tables: { vehicles: { partitionKey: 'registration' } },
 * });
 * await store.putItem('vehicles', { registration: 'ABC123', model: 'Hiace' });
 * const vehicle = await store.getItem('vehicles', { registration: 'ABC123' });
 * ```
 *
 * @internal
 */
export class InMemoryItemStore extends BaseItemStore {
  private tables = new Map<string, Table>();

  constructor(options?: InMemoryItemStoreOptions) {
    super(options);
    for (const [name, schema] of Object.entries(options?.tables ?? {})) {
      this.defineTable(name, schema);
    }
  }

  /**
   * Create (or replace) an empty table
   */
  defineTable(table: string, schema: TableSchema): void {
    this.tables.set(this.tableName(table), { schema, items: new Map() });
  }

  private getTable(table: string): Table {
    const found = this.tables.get(this.tableName(table));
    if (!found) {
      throw new StoreClientError(
        'ResourceNotFoundException',
        `Requested resource not found: ${this.tableName(table)}`
      );
    }
    return found;
  }

  private primaryKey(schema: TableSchema, source: Item | ItemKey): string {
    const attributes = [schema.partitionKey];
    if (schema.sortKey) attributes.push(schema.sortKey);

    const parts: string[] = [];
    for (const attribute of attributes) {
      const part = keyPart(source[attribute]);
      if (part === null) {
        throw new StoreClientError(
          'ValidationException',
          'The provided key element does not match the schema'
        );
      }
      parts.push(part);
    }
    return parts.join('|');
  }

  async getItem(table: string, key: ItemKey): Promise<Item | null> {
    const { schema, items } = this.getTable(table);
    const item = items.get(this.primaryKey(schema, key));
    // Return a copy so caller mutations don't reach stored data
    return item ? cloneItem(item) : null;
  }

  async queryByKey(
    table: string,
    key: KeyCondition,
    indexName?: string
  ): Promise<Item[]> {
    const { schema, items } = this.getTable(table);

    let keySchema: KeySchema = schema;
    if (indexName !== undefined) {
      const index = schema.indexes?.[indexName];
      if (!index) {
        throw new StoreClientError(
          'ValidationException',
          `The table does not have the specified index: ${indexName}`
        );
      }
      keySchema = index;
    }

    if (keySchema.partitionKey !== key.attribute) {
      throw new StoreClientError(
        'ValidationException',
        `Query condition missed key schema element: ${keySchema.partitionKey}`
      );
    }

    const wanted = keyPart(key.value);
    const matches = [...items.values()].filter(
      (item) => keyPart(item[key.attribute]) === wanted
    );

    const { sortKey } = keySchema;
    if (sortKey) {
      matches.sort((a, b) => compareSortValues(a[sortKey], b[sortKey]));
    }

    return matches.map(cloneItem);
  }

  async scanWithFilter(table: string, filter?: ScanFilter): Promise<Item[]> {
    const { items } = this.getTable(table);
    const results: Item[] = [];
    for (const item of items.values()) {
      if (matchesFilter(item, filter)) {
        results.push(cloneItem(item));
      }
    }
    return results;
  }

  async putItem(table: string, item: Item): Promise<void> {
    const { schema, items } = this.getTable(table);
    items.set(this.primaryKey(schema, item), cloneItem(item));
  }

  async refreshCredentials(): Promise<ItemStore> {
    return this;
  }

  /**
   * Remove every item from every table (useful for testing)
   */
  clear(): void {
    for (const table of this.tables.values()) {
      table.items.clear();
    }
  }

  /**
   * Get the number of items in a table (useful for testing)
   */
  size(table: string): number {
    return this.getTable(table).items.size;
  }
}
