/**
 * DynamoDB item store
 *
 * Runs the four ItemStore operations against DynamoDB through the
 * document client of `@aws-sdk/lib-dynamodb`.
 *
 * ## Numbers
 *
 * The document client is built with `wrapNumbers: true`, so numeric
 * attributes arrive as exact decimal strings and are handed to callers as
 * {@link StoreDecimal}. Writes convert them back.
 *
 * ## Credentials
 *
 * A client resolves credentials once. When a session token expires the
 * store raises {@link CredentialExpiredError}; `refreshCredentials()`
 * returns a new store over a new client, which resolves the provider chain
 * again. The old store is left untouched.
 *
 * @public
 */

import { DynamoDBClient, type DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocument,
  NumberValue,
  type GetCommandInput,
  type GetCommandOutput,
  type PutCommandInput,
  type PutCommandOutput,
  type QueryCommandInput,
  type QueryCommandOutput,
  type ScanCommandInput,
  type ScanCommandOutput,
} from '@aws-sdk/lib-dynamodb';
import type {
  Item,
  ItemKey,
  ItemStore,
  ItemValue,
  KeyCondition,
  ScanFilter,
} from '../types/public-api.js';
import { BaseItemStore, type ItemStoreOptions } from './adapter.js';
import { StoreDecimal, isStoreDecimal } from './decimal.js';
import {
  CredentialExpiredError,
  CredentialsMissingError,
  StoreClientError,
  StoreError,
  StoreUnavailableError,
} from './errors.js';

/**
 * The slice of `DynamoDBDocument` this store uses.
 * Tests substitute a fake that records calls.
 */
export interface DocumentTransport {
  get(input: GetCommandInput): Promise<GetCommandOutput>;
  query(input: QueryCommandInput): Promise<QueryCommandOutput>;
  scan(input: ScanCommandInput): Promise<ScanCommandOutput>;
  put(input: PutCommandInput): Promise<PutCommandOutput>;
}

export interface DynamoDBItemStoreOptions extends ItemStoreOptions {
  /** AWS region; falls back to the SDK's own resolution when unset */
  region?: string;
  /** Extra low-level client settings (endpoint, retries, ...) */
  clientConfig?: DynamoDBClientConfig;
  /** Builds the document client. Called again on every credential refresh. */
  createTransport?: () => DocumentTransport;
}

/** Compiled form of a {@link ScanFilter} */
export interface FilterExpressionParts {
  FilterExpression?: string;
  ExpressionAttributeNames?: Record<string, string>;
  ExpressionAttributeValues?: Record<string, string | number | boolean>;
}

const EXPIRED_TOKEN_ERRORS = new Set(['ExpiredTokenException', 'ExpiredToken']);

/**
 * Translate an AWS SDK failure into the store error taxonomy
 */
export function classifyStoreError(error: unknown): StoreError {
  if (error instanceof StoreError) return error;

  if (!(error instanceof Error)) {
    return new StoreUnavailableError(`Store request failed: ${String(error)}`, { cause: error });
  }

  if (EXPIRED_TOKEN_ERRORS.has(error.name)) {
    return new CredentialExpiredError(error.message, { cause: error });
  }

  if (error.name === 'CredentialsProviderError') {
    return new CredentialsMissingError(error.message, { cause: error });
  }

  if ('$fault' in error && error.$fault === 'client') {
    return new StoreClientError(error.name, error.message, { cause: error });
  }

  return new StoreUnavailableError(error.message, { cause: error });
}

/**
 * Compile a scan filter into a DynamoDB filter expression
 */
export function compileFilter(filter: ScanFilter = []): FilterExpressionParts {
  if (filter.length === 0) return {};

  const names: Record<string, string> = {};
  const values: Record<string, string | number | boolean> = {};
  const clauses = filter.map((condition, i) => {
    const name = `#f${i}`;
    const value = `:v${i}`;
    names[name] = condition.attribute;
    values[value] = condition.value;

    switch (condition.op) {
      case 'eq':
        return `${name} = ${value}`;
      case 'contains':
        return `contains(${name}, ${value})`;
      case 'gt':
        return `${name} > ${value}`;
    }
  });

  return {
    FilterExpression: clauses.join(' AND '),
    ExpressionAttributeNames: names,
    ExpressionAttributeValues: values,
  };
}

function toItemValue(value: unknown): ItemValue {
  if (value instanceof NumberValue) return new StoreDecimal(value.toString());
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (value === undefined) return null;
  if (typeof value === 'bigint') return new StoreDecimal(value.toString());
  if (Array.isArray(value)) return value.map(toItemValue);
  if (value instanceof Set) return [...value].map(toItemValue);
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  if (typeof value === 'object' && value !== null) return toItem(value);
  return String(value);
}

function toItem(record: object): Item {
  const item: Item = {};
  for (const [attribute, value] of Object.entries(record)) {
    item[attribute] = toItemValue(value);
  }
  return item;
}

function toStoreValue(value: ItemValue): unknown {
  if (isStoreDecimal(value)) return new NumberValue(value.value);
  if (Array.isArray(value)) return value.map(toStoreValue);
  if (value !== null && typeof value === 'object') return toStoreRecord(value);
  return value;
}

function toStoreRecord(item: Item): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const [attribute, value] of Object.entries(item)) {
    record[attribute] = toStoreValue(value);
  }
  return record;
}

/**
 * DynamoDB item store
 *
 * @example
 * ```typescript
 * const store = new DynamoDBItemStore({ region: 'ap-southeast-2' });
 * const bookings = await store.queryByKey('customer_bookings', {
 *   attribute: 'contact_phone',
 *   value: '+64 21 000 0000',
 * });
 * ```
 */
export class DynamoDBItemStore extends BaseItemStore {
  private readonly options: DynamoDBItemStoreOptions;
  private readonly transport: DocumentTransport;

  constructor(options: DynamoDBItemStoreOptions = {}) {
    super(options);
    this.options = options;
    this.transport = options.createTransport
      ? options.createTransport()
      : DynamoDBItemStore.defaultTransport(options);
  }

  private static defaultTransport(options: DynamoDBItemStoreOptions): DocumentTransport {
    const client = new DynamoDBClient({
      ...options.clientConfig,
      ...(options.region ? { region: options.region } : {}),
    });
    return DynamoDBDocument.from(client, {
      marshallOptions: { removeUndefinedValues: true },
      unmarshallOptions: { wrapNumbers: true },
    });
  }

  private async send<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw classifyStoreError(error);
    }
  }

  async getItem(table: string, key: ItemKey): Promise<Item | null> {
    const output = await this.send(() =>
      this.transport.get({ TableName: this.tableName(table), Key: key })
    );
    return output.Item ? toItem(output.Item) : null;
  }

  async queryByKey(
    table: string,
    key: KeyCondition,
    indexName?: string
  ): Promise<Item[]> {
    const items: Item[] = [];
    let startKey: Record<string, unknown> | undefined;

    do {
      const output = await this.send(() =>
        this.transport.query({
          TableName: this.tableName(table),
          ...(indexName !== undefined && { IndexName: indexName }),
          KeyConditionExpression: '#pk = :pk',
          ExpressionAttributeNames: { '#pk': key.attribute },
          ExpressionAttributeValues: { ':pk': key.value },
          ...(startKey && { ExclusiveStartKey: startKey }),
        })
      );
      for (const record of output.Items ?? []) {
        items.push(toItem(record));
      }
      startKey = output.LastEvaluatedKey;
    } while (startKey);

    return items;
  }

  async scanWithFilter(table: string, filter?: ScanFilter): Promise<Item[]> {
    const expression = compileFilter(filter);
    const items: Item[] = [];
    let startKey: Record<string, unknown> | undefined;

    do {
      const output = await this.send(() =>
        this.transport.scan({
          TableName: this.tableName(table),
          ...expression,
          ...(startKey && { ExclusiveStartKey: startKey }),
        })
      );
      for (const record of output.Items ?? []) {
        items.push(toItem(record));
      }
      startKey = output.LastEvaluatedKey;
    } while (startKey);

    return items;
  }

  async putItem(table: string, item: Item): Promise<void> {
    await this.send(() =>
      this.transport.put({ TableName: this.tableName(table), Item: toStoreRecord(item) })
    );
  }

  async refreshCredentials(): Promise<ItemStore> {
    return new DynamoDBItemStore(this.options);
  }
}
