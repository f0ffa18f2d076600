import { readFileSync } from 'node:fs';
import { DynamoDBItemStore, InMemoryItemStore, type ItemStore, type Logger } from '@concierge/core';
import { parseSeed, seedItems, travelTableSchemas, type TravelSeed, type TravelSettings } from '@concierge/travel-tools';

export function loadDemoSeed(): TravelSeed {
  const raw = readFileSync(new URL('../data/demo-items.json', import.meta.url), 'utf-8');
  return parseSeed(JSON.parse(raw));
}

/**
 * DynamoDB in normal use; an in-memory store loaded with demo data when
 * `STORE_BACKEND=memory`.
 */
export async function createDeskStore(
  settings: TravelSettings,
  logger: Logger,
  tablePrefix?: string,
): Promise<ItemStore> {
  if (settings.storeBackend === 'dynamodb') {
    logger.info({ region: settings.region ?? 'sdk default', tables: settings.tables }, 'Using DynamoDB store');
    return new DynamoDBItemStore({ region: settings.region, tablePrefix });
  }

  const store = new InMemoryItemStore({ tables: travelTableSchemas(settings.tables), tablePrefix });
  const result = await seedItems(store, settings.tables, loadDemoSeed());
  logger.info(result, 'Using in-memory store with demo data');
  return store;
}
