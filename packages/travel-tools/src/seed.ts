import type { Item, ItemStore, ItemValue } from '@concierge/core';
import { z } from 'zod';
import { SEED_MARKER_TABLE } from './tables.js';
import type { TravelTables } from './types.js';

/** Items to load, per logical table */
export interface TravelSeed {
  accommodations?: Item[];
  bookings?: Item[];
  vehicles?: Item[];
  profiles?: Item[];
}

/** Marker written to the seed-marker table once seeding has run */
export const SEED_MARKER_ID = '_initialized';

const itemValue: z.ZodType<ItemValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(itemValue), z.record(itemValue)]),
);

const itemSchema = z.record(itemValue);

const seedSchema = z.object({
  accommodations: z.array(itemSchema).optional(),
  bookings: z.array(itemSchema).optional(),
  vehicles: z.array(itemSchema).optional(),
  profiles: z.array(itemSchema).optional(),
});

/** Validate seed data read from JSON */
export function parseSeed(data: unknown): TravelSeed {
  return seedSchema.parse(data);
}

export async function seedItems(
  store: ItemStore,
  tables: TravelTables,
  seed: TravelSeed,
): Promise<{ seeded: number; skipped: number }> {
  const batches: Array<[string, Item[]]> = [
    [tables.accommodations, seed.accommodations ?? []],
    [tables.bookings, seed.bookings ?? []],
    [tables.vehicles, seed.vehicles ?? []],
    [tables.profiles, seed.profiles ?? []],
  ];
  const total = batches.reduce((n, [, items]) => n + items.length, 0);

  const marker = await store.getItem(SEED_MARKER_TABLE, { marker_id: SEED_MARKER_ID });
  if (marker) {
    return { seeded: 0, skipped: total };
  }

  for (const [table, items] of batches) {
    for (const item of items) {
      await store.putItem(table, item);
    }
  }

  await store.putItem(SEED_MARKER_TABLE, { marker_id: SEED_MARKER_ID });

  return { seeded: total, skipped: 0 };
}
