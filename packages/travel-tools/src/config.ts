import { defaultApplianceGuides, type ApplianceGuides } from './appliance-guides.js';
import type { FlightClient } from './flights.js';
import { defaultGeoIndex, type GeoIndex } from './geo-index.js';
import { DEFAULT_BOOKING_REF_PREFIX } from './bookings.js';
import { DEFAULT_MAX_DISTANCE_KM } from './lookup-engine.js';
import { DEFAULT_TABLES } from './tables.js';
import type { TravelTables } from './types.js';

export interface TravelToolsConfig {
  tables?: TravelTables;
  /** Place table for the proximity fallback (default: built-in NZ places) */
  geoIndex?: GeoIndex;
  /** Troubleshooting table (default: built-in campervan guides) */
  applianceGuides?: ApplianceGuides;
  bookingRefPrefix?: string;
  defaultMaxDistanceKm?: number;
  /** Omit to leave flight search unconfigured; the tool then reports it unavailable */
  flightClient?: FlightClient;
  flightCurrency?: string;
  random?: () => number;
  now?: () => Date;
}

export interface ResolvedTravelConfig {
  tables: TravelTables;
  geoIndex: GeoIndex;
  applianceGuides: ApplianceGuides;
  bookingRefPrefix: string;
  defaultMaxDistanceKm: number;
  flightClient?: FlightClient;
  flightCurrency: string;
  random?: () => number;
  now?: () => Date;
}

export function resolveConfig(config: TravelToolsConfig = {}): ResolvedTravelConfig {
  return {
    tables: config.tables ?? DEFAULT_TABLES,
    geoIndex: config.geoIndex ?? defaultGeoIndex(),
    applianceGuides: config.applianceGuides ?? defaultApplianceGuides(),
    bookingRefPrefix: config.bookingRefPrefix ?? DEFAULT_BOOKING_REF_PREFIX,
    defaultMaxDistanceKm: config.defaultMaxDistanceKm ?? DEFAULT_MAX_DISTANCE_KM,
    flightClient: config.flightClient,
    flightCurrency: config.flightCurrency ?? 'NZD',
    random: config.random,
    now: config.now,
  };
}
