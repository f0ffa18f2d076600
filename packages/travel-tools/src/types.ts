import type { Item } from '@concierge/core';

/** Names of the tables the travel tools read and write */
export interface TravelTables {
  bookings: string;
  /** Secondary index on `booking_ref` */
  bookingsIndex: string;
  vehicles: string;
  accommodations: string;
  profiles: string;
}

export const IDENTIFIER_TYPES = ['booking_ref', 'contact_phone', 'vehicle_reg', 'customer_id'] as const;

export type IdentifierType = (typeof IDENTIFIER_TYPES)[number];

export interface Identifier {
  type: IdentifierType;
  value: string;
}

/**
 * Optional accommodation predicates, AND-combined.
 * `undefined` means the predicate is not applied.
 */
export interface SearchFilter {
  family_friendly?: boolean;
  pet_friendly?: boolean;
  powered_site?: boolean;
}

export interface LocationSearch {
  location: string;
  filter?: SearchFilter;
  /** Radius for the proximity fallback, in km */
  maxDistanceKm?: number;
}

export type LookupRequest =
  | { strategy: 'identifier'; identifier: Identifier }
  | { strategy: 'accommodation_location'; search: LocationSearch };

export interface CustomerMatch {
  /** Table the customer record was read from */
  source: 'bookings' | 'profiles';
  customer: Item;
  vehicle: Item | null;
}

/** How a location search produced its records */
export type SearchPhase = 'exact' | 'proximity';

export type LookupResult =
  | { kind: 'customer'; match: CustomerMatch }
  | { kind: 'accommodations'; phase: SearchPhase; records: Item[] }
  | { kind: 'not_found'; message: string };

export interface GeoPlace {
  name: string;
  lat: number;
  lon: number;
}

/** Fields accepted when creating a booking */
export interface BookingFields {
  contact_phone?: string;
  accommodation_id?: string;
  trip_start?: string;
  trip_end?: string;
  customer_name?: string;
  site_type?: string;
  vehicle_reg?: string;
  num_guests?: number;
  special_requests?: string;
  customer_booking_ref?: string;
}

/** Fields a booking modification may change */
export interface BookingChanges {
  trip_start?: string;
  trip_end?: string;
  site_type?: string;
  num_guests?: number;
  special_requests?: string;
  customer_name?: string;
  vehicle_reg?: string;
}

export type BookingStatus = 'confirmed' | 'cancelled';

/** Caller-facing result envelope */
export type Envelope<T> =
  | { status: 'success'; response: T }
  | { status: 'error'; response: string };

export interface NotFoundResponse {
  found: false;
  message: string;
}
