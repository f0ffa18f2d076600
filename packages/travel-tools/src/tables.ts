import type { TableSchema } from '@concierge/core';
import type { TravelTables } from './types.js';

export const DEFAULT_BOOKINGS_TABLE = 'customer_bookings';

/** Bookkeeping table for seed markers, kept apart from the domain tables */
export const SEED_MARKER_TABLE = 'seed_markers';

export const DEFAULT_TABLES: TravelTables = {
  bookings: DEFAULT_BOOKINGS_TABLE,
  bookingsIndex: `${DEFAULT_BOOKINGS_TABLE}-index`,
  vehicles: 'vehicle_information',
  accommodations: 'accommodation_options',
  profiles: 'customer_profiles',
};

/**
 * Key schemas of the travel tables, for stores that need them declared
 * (the in-memory store).
 */
export function travelTableSchemas(tables: TravelTables): Record<string, TableSchema> {
  return {
    [tables.bookings]: {
      partitionKey: 'contact_phone',
      sortKey: 'booking_ref',
      indexes: {
        [tables.bookingsIndex]: { partitionKey: 'booking_ref' },
      },
    },
    [tables.vehicles]: { partitionKey: 'registration' },
    [tables.accommodations]: { partitionKey: 'accommodation_id' },
    [tables.profiles]: { partitionKey: 'customerId', sortKey: 'bookingReference' },
    [SEED_MARKER_TABLE]: { partitionKey: 'marker_id' },
  };
}
