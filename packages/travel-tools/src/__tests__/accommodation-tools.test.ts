import { describe, it, expect, beforeEach } from 'vitest';
import { StoreDecimal, StoreUnavailableError, type InMemoryItemStore, type ToolContext } from '@concierge/core';
import { createAccommodationTools, ACCOMMODATION_SYSTEM_MESSAGE } from '../tools/accommodation-tools.js';
import { resolveConfig } from '../config.js';
import { GeoIndex } from '../geo-index.js';
import { DEFAULT_TABLES } from '../tables.js';
import { FailingStore, createTravelStore, findTool, makeTestCtx, readJson } from '../testing.js';

const tables = DEFAULT_TABLES;
const config = resolveConfig({
  geoIndex: new GeoIndex([
    { name: 'auckland', lat: -36.8509, lon: 174.7645 },
    { name: 'wellington', lat: -41.2865, lon: 174.7762 },
  ]),
});

const finder = findTool(createAccommodationTools('travel', config), 'travel-accommodation_finder');

let store: InMemoryItemStore;
let ctx: ToolContext;

beforeEach(async () => {
  store = createTravelStore();
  ctx = makeTestCtx(store);

  await store.putItem(tables.accommodations, {
    accommodation_id: 'A1',
    accommodation_name: 'Central Camp',
    accommodation_location: 'Auckland',
    family_friendly: true,
    pet_friendly: false,
    powered_sites_available: new StoreDecimal('5'),
  });
  await store.putItem(tables.accommodations, {
    accommodation_id: 'A2',
    accommodation_name: 'North Shore Park',
    accommodation_location: 'Takapuna',
    pet_friendly: true,
    latitude: new StoreDecimal('-36.7877'),
    longitude: new StoreDecimal('174.7730'),
  });
  await store.putItem(tables.accommodations, {
    accommodation_id: 'A3',
    accommodation_name: 'Harbour Park',
    accommodation_location: 'Wellington',
    pet_friendly: true,
    latitude: '-41.2865',
    longitude: '174.7762',
  });
});

describe('accommodation_finder', () => {
  it('returns exact location matches without distances', async () => {
    const result = await finder.handler({ location: 'Auckland' }, ctx);

    expect(readJson(result)).toEqual({
      status: 'success',
      response: [
        {
          id: 'A1',
          name: 'Central Camp',
          location: 'Auckland',
          family_friendly: true,
          pet_friendly: false,
          powered_sites_available: 5,
        },
      ],
    });
  });

  it('falls back to nearby options with their distance', async () => {
    const result = await finder.handler({ location: 'Auckland CBD' }, ctx);

    expect(readJson(result)).toEqual({
      status: 'success',
      response: [
        { id: 'A2', name: 'North Shore Park', location: 'Takapuna', pet_friendly: true, distance_km: 7.1 },
      ],
    });
  });

  it('applies filters to the fallback when they empty the exact phase', async () => {
    const result = await finder.handler({ location: 'Auckland', pet_friendly: true }, ctx);

    expect(readJson(result)).toEqual({
      status: 'success',
      response: [
        { id: 'A2', name: 'North Shore Park', location: 'Takapuna', pet_friendly: true, distance_km: 7.1 },
      ],
    });
  });

  it('reports nothing within the radius as not found', async () => {
    const result = await finder.handler({ location: 'Auckland CBD', max_distance: 5 }, ctx);

    expect(result.isError).toBeUndefined();
    expect(readJson(result)).toEqual({
      status: 'success',
      response: {
        found: false,
        message: 'No accommodation options found matching your criteria near Auckland CBD',
      },
    });
  });

  it('names a location it cannot place', async () => {
    const result = await finder.handler({ location: 'Atlantis' }, ctx);

    expect(result.isError).toBe(true);
    expect(readJson(result)).toEqual({
      status: 'error',
      response: 'Could not find coordinates for location: Atlantis',
    });
  });

  it('rejects a non-positive radius', async () => {
    const result = await finder.handler({ location: 'Auckland', max_distance: -1 }, ctx);

    expect(readJson(result)).toEqual({
      status: 'error',
      response: 'Invalid input: max_distance: Number must be greater than 0',
    });
  });

  it('hides store failures behind a generic message', async () => {
    const failing = new FailingStore(store, 1, () => new StoreUnavailableError('timeout'));
    const result = await finder.handler({ location: 'Auckland' }, makeTestCtx(failing));

    expect(result.isError).toBe(true);
    expect(readJson(result)).toEqual({ status: 'error', response: ACCOMMODATION_SYSTEM_MESSAGE });
  });
});
