import type { FilterCondition, Item, ItemStore, Logger, ScanFilter } from '@concierge/core';
import type { GeoIndex } from './geo-index.js';
import { haversineKm, parseCoordinate } from './geo-index.js';
import { InvalidIdentifierTypeError, LocationNotResolvableError } from './errors.js';
import { resilientCall, type CredentialRefresh } from './resilient-call.js';
import {
  IDENTIFIER_TYPES,
  type CustomerMatch,
  type Identifier,
  type IdentifierType,
  type LocationSearch,
  type LookupRequest,
  type LookupResult,
  type SearchFilter,
  type TravelTables,
} from './types.js';

export const DEFAULT_MAX_DISTANCE_KM = 50;

export const CUSTOMER_NOT_FOUND_MESSAGE =
  "Sorry, we couldn't find any customer information with the provided details.";

export interface LookupEngineOptions {
  store: ItemStore;
  logger: Logger;
  tables: TravelTables;
  geoIndex: GeoIndex;
  defaultMaxDistanceKm?: number;
  refresh?: CredentialRefresh;
}

export function isIdentifierType(value: string): value is IdentifierType {
  return IDENTIFIER_TYPES.some((t) => t === value);
}

/** Drop the separators customers type into ids: spaces, `-` and `.` */
export function normalizeCustomerId(value: string): string {
  return value.replace(/[\s.-]/g, '');
}

/**
 * Scan conditions for the optional accommodation predicates.
 * `powered_site: false` adds nothing; only `true` constrains.
 */
export function buildSearchFilter(filter: SearchFilter = {}): FilterCondition[] {
  const conditions: FilterCondition[] = [];
  if (filter.family_friendly !== undefined) {
    conditions.push({ op: 'eq', attribute: 'family_friendly', value: filter.family_friendly });
  }
  if (filter.pet_friendly !== undefined) {
    conditions.push({ op: 'eq', attribute: 'pet_friendly', value: filter.pet_friendly });
  }
  if (filter.powered_site === true) {
    conditions.push({ op: 'gt', attribute: 'powered_sites_available', value: 0 });
  }
  return conditions;
}

function stringAttribute(item: Item, attribute: string): string | undefined {
  const value = item[attribute];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Resolves lookups by identifier and accommodation searches by location,
 * each inside the one-retry credential wrapper.
 */
export class LookupEngine {
  private readonly store: ItemStore;
  private readonly logger: Logger;
  private readonly tables: TravelTables;
  private readonly geoIndex: GeoIndex;
  private readonly defaultMaxDistanceKm: number;
  private readonly refresh?: CredentialRefresh;

  constructor(options: LookupEngineOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.tables = options.tables;
    this.geoIndex = options.geoIndex;
    this.defaultMaxDistanceKm = options.defaultMaxDistanceKm ?? DEFAULT_MAX_DISTANCE_KM;
    this.refresh = options.refresh;
  }

  async lookup(request: LookupRequest): Promise<LookupResult> {
    if (request.strategy === 'identifier') {
      return this.lookupCustomer(request.identifier);
    }
    return this.searchAccommodation(request.search);
  }

  // ── identifier lookups ──────────────────────────────────────

  async lookupCustomer(identifier: { type: string; value: string }): Promise<LookupResult> {
    if (!isIdentifierType(identifier.type)) {
      throw new InvalidIdentifierTypeError(identifier.type);
    }
    const id: Identifier = { type: identifier.type, value: identifier.value };
    this.logger.info({ identifierType: id.type }, 'Customer lookup');

    const match = await resilientCall((store) => this.findCustomer(store, id), {
      store: this.store,
      logger: this.logger,
      operation: 'customer_lookup',
      refresh: this.refresh,
    });

    if (!match) {
      this.logger.info({ identifierType: id.type }, 'No customer found');
      return { kind: 'not_found', message: CUSTOMER_NOT_FOUND_MESSAGE };
    }
    return { kind: 'customer', match };
  }

  private async findCustomer(store: ItemStore, id: Identifier): Promise<CustomerMatch | null> {
    const { tables } = this;

    switch (id.type) {
      case 'contact_phone': {
        const [customer] = await store.queryByKey(tables.bookings, {
          attribute: 'contact_phone',
          value: id.value,
        });
        return customer ? this.withVehicle(store, 'bookings', customer) : null;
      }
      case 'booking_ref': {
        const [customer] = await store.queryByKey(
          tables.bookings,
          { attribute: 'booking_ref', value: id.value },
          tables.bookingsIndex,
        );
        return customer ? this.withVehicle(store, 'bookings', customer) : null;
      }
      case 'customer_id': {
        const [customer] = await store.queryByKey(tables.profiles, {
          attribute: 'customerId',
          value: normalizeCustomerId(id.value),
        });
        return customer ? this.withVehicle(store, 'profiles', customer) : null;
      }
      case 'vehicle_reg': {
        const vehicle = await store.getItem(tables.vehicles, { registration: id.value });
        if (!vehicle) return null;
        const [customer] = await store.scanWithFilter(tables.bookings, [
          { op: 'eq', attribute: 'vehicle_reg', value: id.value },
        ]);
        return customer ? { source: 'bookings', customer, vehicle } : null;
      }
    }
  }

  private async withVehicle(
    store: ItemStore,
    source: CustomerMatch['source'],
    customer: Item,
  ): Promise<CustomerMatch> {
    const registration = stringAttribute(customer, 'vehicle_reg');
    const vehicle = registration
      ? await store.getItem(this.tables.vehicles, { registration })
      : null;
    return { source, customer, vehicle };
  }

  // ── location search ─────────────────────────────────────────

  async searchAccommodation(search: LocationSearch): Promise<LookupResult> {
    const maxDistanceKm = search.maxDistanceKm ?? this.defaultMaxDistanceKm;
    this.logger.info({ location: search.location, filter: search.filter, maxDistanceKm }, 'Accommodation search');

    return resilientCall<LookupResult>(
      async (store) => {
        const exact = await this.exactPhase(store, search);
        if (exact.length > 0) {
          return { kind: 'accommodations', phase: 'exact', records: exact };
        }

        const nearby = await this.proximityPhase(store, search, maxDistanceKm);
        if (nearby.length > 0) {
          return { kind: 'accommodations', phase: 'proximity', records: nearby };
        }

        return {
          kind: 'not_found',
          message: `No accommodation options found matching your criteria near ${search.location}`,
        };
      },
      {
        store: this.store,
        logger: this.logger,
        operation: 'accommodation_search',
        refresh: this.refresh,
      },
    );
  }

  private exactPhase(store: ItemStore, search: LocationSearch): Promise<Item[]> {
    const filter: ScanFilter = [
      { op: 'contains', attribute: 'accommodation_location', value: search.location },
      ...buildSearchFilter(search.filter),
    ];
    return store.scanWithFilter(this.tables.accommodations, filter);
  }

  private async proximityPhase(
    store: ItemStore,
    search: LocationSearch,
    maxDistanceKm: number,
  ): Promise<Item[]> {
    const origin = this.geoIndex.resolve(search.location);
    if (!origin) {
      throw new LocationNotResolvableError(search.location);
    }

    const candidates = await store.scanWithFilter(
      this.tables.accommodations,
      buildSearchFilter(search.filter),
    );

    const nearby: Array<{ item: Item; distance: number }> = [];
    for (const item of candidates) {
      const lat = parseCoordinate(item['latitude']);
      const lon = parseCoordinate(item['longitude']);
      if (lat === undefined || lon === undefined) continue;
      if (lat === null || lon === null) {
        this.logger.warn(
          { accommodationId: item['accommodation_id'] ?? null },
          'Skipping accommodation with unparseable coordinates',
        );
        continue;
      }

      const distance = haversineKm(origin.lat, origin.lon, lat, lon);
      if (distance <= maxDistanceKm) {
        nearby.push({ item, distance });
      }
    }

    // Array.prototype.sort is stable, so equal distances keep store order
    nearby.sort((a, b) => a.distance - b.distance);

    return nearby.map(({ item, distance }) => ({
      ...item,
      distance_km: Math.round(distance * 10) / 10,
    }));
  }
}
