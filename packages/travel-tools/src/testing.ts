import {
  CredentialExpiredError,
  InMemoryItemStore,
  createSilentLogger,
  type Item,
  type ItemKey,
  type ItemStore,
  type KeyCondition,
  type ScanFilter,
  type ConciergeTool,
  type ToolContext,
  type ToolResult,
} from '@concierge/core';
import { DEFAULT_TABLES, travelTableSchemas } from './tables.js';
import type { TravelTables } from './types.js';

/**
 * In-memory store with the travel tables declared.
 */
export function createTravelStore(tables: TravelTables = DEFAULT_TABLES): InMemoryItemStore {
  return new InMemoryItemStore({ tables: travelTableSchemas(tables) });
}

export function makeTestCtx(store?: ItemStore): ToolContext {
  return {
    store: store ?? createTravelStore(),
    logger: createSilentLogger(),
    debugMode: false,
    requestId: 'req-1',
  };
}

export function findTool(tools: readonly ConciergeTool[], name: string): ConciergeTool {
  const tool = tools.find((t) => t.name === name);
  if (!tool) throw new Error(`No tool named ${name}`);
  return tool;
}

/** Parsed JSON body of a tool result's first text block */
export function readJson(result: ToolResult): unknown {
  const [first] = result.content;
  if (first?.type !== 'text') throw new Error('Expected a text result');
  return JSON.parse(first.text);
}

/**
 * Store wrapper whose first `failures` operations throw the error built by
 * `makeError` (an expired credential by default). Refreshing returns the
 * same wrapper, so the failure budget and counters carry across a retry.
 */
export class FailingStore implements ItemStore {
  calls = 0;
  refreshes = 0;

  constructor(
    private readonly inner: ItemStore,
    private failures: number,
    private readonly makeError: () => Error = () => new CredentialExpiredError('The security token included in the request is expired'),
  ) {}

  private async run<T>(op: () => Promise<T>): Promise<T> {
    this.calls++;
    if (this.failures > 0) {
      this.failures--;
      throw this.makeError();
    }
    return op();
  }

  getItem(table: string, key: ItemKey): Promise<Item | null> {
    return this.run(() => this.inner.getItem(table, key));
  }

  queryByKey(table: string, key: KeyCondition, indexName?: string): Promise<Item[]> {
    return this.run(() => this.inner.queryByKey(table, key, indexName));
  }

  scanWithFilter(table: string, filter?: ScanFilter): Promise<Item[]> {
    return this.run(() => this.inner.scanWithFilter(table, filter));
  }

  putItem(table: string, item: Item): Promise<void> {
    return this.run(() => this.inner.putItem(table, item));
  }

  async refreshCredentials(): Promise<ItemStore> {
    this.refreshes++;
    return this;
  }
}
