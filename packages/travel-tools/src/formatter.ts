import { isStoreDecimal, type Item, type ItemValue } from '@concierge/core';

/** A value as handed to callers: store decimals already converted */
export type PlainValue =
  | string
  | number
  | boolean
  | null
  | PlainValue[]
  | { [key: string]: PlainValue };

export type PublicRecord = Record<string, PlainValue>;

/**
 * Convert store decimals to native numbers, recursively.
 */
export function toPlain(value: ItemValue): PlainValue {
  if (isStoreDecimal(value)) return value.toNumber();
  if (Array.isArray(value)) return value.map(toPlain);
  if (typeof value === 'object' && value !== null) {
    const out: Record<string, PlainValue> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = toPlain(v);
    }
    return out;
  }
  return value;
}

/** Output field name paired with the source attribute it comes from */
type FieldMap = ReadonlyArray<readonly [output: string, source: string]>;

function same(...names: string[]): FieldMap {
  return names.map((n) => [n, n] as const);
}

function project(item: Item, fields: FieldMap): PublicRecord {
  const out: PublicRecord = {};
  for (const [output, source] of fields) {
    const value = item[source];
    if (value !== undefined) {
      out[output] = toPlain(value);
    }
  }
  return out;
}

const ACCOMMODATION_FIELDS: FieldMap = [
  ['id', 'accommodation_id'],
  ['name', 'accommodation_name'],
  ['location', 'accommodation_location'],
  ...same(
    'type',
    'price_range',
    'family_friendly',
    'pet_friendly',
    'amenities',
    'powered_sites_available',
    'unpowered_sites_available',
    'cabins_available',
    'distance_km',
  ),
];

const BOOKING_FIELDS: FieldMap = same(
  'booking_ref',
  'contact_phone',
  'customer_name',
  'customer_booking_ref',
  'accommodation_id',
  'accommodation_name',
  'accommodation_location',
  'trip_start',
  'trip_end',
  'site_type',
  'num_guests',
  'vehicle_reg',
  'special_requests',
  'status',
  'created_at',
  'updated_at',
  'cancelled_at',
);

const VEHICLE_FIELDS: FieldMap = same(
  'registration',
  'make',
  'model',
  'year',
  'vehicle_type',
  'berths',
  'fuel_type',
  'transmission',
  'status',
);

const FLIGHT_PROFILE_FIELDS: FieldMap = same(
  'customerId',
  'firstName',
  'lastName',
  'email',
  'phone',
  'membershipTier',
  'bookingReference',
  'flightNumber',
  'origin',
  'destination',
  'departureDate',
  'departureTime',
  'arrivalDate',
  'arrivalTime',
  'seat',
  'cabinClass',
  'bookingStatus',
  'vehicle_reg',
);

export function formatAccommodation(item: Item): PublicRecord {
  return project(item, ACCOMMODATION_FIELDS);
}

export function formatBooking(item: Item): PublicRecord {
  return project(item, BOOKING_FIELDS);
}

export function formatVehicle(item: Item): PublicRecord {
  return project(item, VEHICLE_FIELDS);
}

export function formatFlightProfile(item: Item): PublicRecord {
  return project(item, FLIGHT_PROFILE_FIELDS);
}

export const formatAccommodations = (items: readonly Item[]): PublicRecord[] =>
  items.map(formatAccommodation);
