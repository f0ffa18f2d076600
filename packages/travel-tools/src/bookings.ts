import type { Item, ItemStore, Logger } from '@concierge/core';
import {
  AccommodationNotFoundError,
  BookingCancelledError,
  BookingNotFoundError,
  InvalidTripDatesError,
  MissingFieldsError,
} from './errors.js';
import { resilientCall, type CredentialRefresh } from './resilient-call.js';
import type { BookingChanges, BookingFields, TravelTables } from './types.js';

export const DEFAULT_BOOKING_REF_PREFIX = 'TRV';

const REF_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const REF_SUFFIX_LENGTH = 5;

const REQUIRED_FIELDS = ['contact_phone', 'accommodation_id', 'trip_start', 'trip_end'] as const;

const OPTIONAL_FIELDS = [
  'customer_name',
  'site_type',
  'vehicle_reg',
  'num_guests',
  'special_requests',
  'customer_booking_ref',
] as const;

const MODIFIABLE_FIELDS = [
  'trip_start',
  'trip_end',
  'site_type',
  'num_guests',
  'special_requests',
  'customer_name',
  'vehicle_reg',
] as const;

export interface BookingOutcome {
  booking_ref: string;
  message: string;
  details: Item;
}

export interface BookingManagerOptions {
  store: ItemStore;
  logger: Logger;
  tables: TravelTables;
  prefix?: string;
  /** Uniform in [0, 1); defaults to Math.random */
  random?: () => number;
  now?: () => Date;
  refresh?: CredentialRefresh;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * `PREFIX-YYYYMMDD-XXXXX`, dated in local time. No collision check.
 */
export function generateBookingRef(
  prefix: string,
  now: Date,
  random: () => number = Math.random,
): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  let suffix = '';
  for (let i = 0; i < REF_SUFFIX_LENGTH; i++) {
    const index = Math.min(Math.floor(random() * REF_ALPHABET.length), REF_ALPHABET.length - 1);
    suffix += REF_ALPHABET.charAt(index);
  }
  return `${prefix}-${date}-${suffix}`;
}

/** True for a real calendar date written as YYYY-MM-DD */
export function isIsoDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  const y = Number(match[1]);
  const m = Number(match[2]);
  const d = Number(match[3]);
  const date = new Date(Date.UTC(y, m - 1, d));
  return date.getUTCFullYear() === y && date.getUTCMonth() === m - 1 && date.getUTCDate() === d;
}

function checkTripDates(tripStart: string, tripEnd: string): void {
  if (!isIsoDate(tripStart) || !isIsoDate(tripEnd)) {
    throw new InvalidTripDatesError('Trip dates must be valid dates in YYYY-MM-DD format');
  }
  if (tripEnd < tripStart) {
    throw new InvalidTripDatesError('trip_end must not be before trip_start');
  }
}

function snapshotText(item: Item, attribute: string, fallback: string): string {
  const value = item[attribute];
  return typeof value === 'string' && value !== '' ? value : fallback;
}

function isSet<T>(value: T | undefined | null | ''): value is T {
  return value !== undefined && value !== null && value !== '';
}

/**
 * Creates, modifies and cancels bookings.
 *
 * A booking stores a snapshot of the accommodation's name and location taken
 * when it was created; later edits to the accommodation do not reach it.
 */
export class BookingManager {
  private readonly store: ItemStore;
  private readonly logger: Logger;
  private readonly tables: TravelTables;
  private readonly prefix: string;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly refresh?: CredentialRefresh;

  constructor(options: BookingManagerOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.tables = options.tables;
    this.prefix = options.prefix ?? DEFAULT_BOOKING_REF_PREFIX;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.refresh = options.refresh;
  }

  async createBooking(fields: BookingFields): Promise<BookingOutcome> {
    const missing = REQUIRED_FIELDS.filter((f) => !isSet(fields[f]));
    if (missing.length > 0) {
      throw new MissingFieldsError(missing);
    }

    const contactPhone = fields.contact_phone ?? '';
    const accommodationId = fields.accommodation_id ?? '';
    const tripStart = fields.trip_start ?? '';
    const tripEnd = fields.trip_end ?? '';
    checkTripDates(tripStart, tripEnd);

    const now = this.now();
    const bookingRef = generateBookingRef(this.prefix, now, this.random);
    this.logger.info({ bookingRef, accommodationId }, 'Creating booking');

    const details = await resilientCall(
      async (store) => {
        const accommodation = await store.getItem(this.tables.accommodations, {
          accommodation_id: accommodationId,
        });
        if (!accommodation) {
          throw new AccommodationNotFoundError(accommodationId);
        }

        const item: Item = {
          booking_ref: bookingRef,
          contact_phone: contactPhone,
          accommodation_id: accommodationId,
          accommodation_name: snapshotText(accommodation, 'accommodation_name', 'Unknown Accommodation'),
          accommodation_location: snapshotText(accommodation, 'accommodation_location', 'Unknown Location'),
          trip_start: tripStart,
          trip_end: tripEnd,
          status: 'confirmed',
          created_at: now.toISOString(),
        };
        for (const field of OPTIONAL_FIELDS) {
          const value = fields[field];
          if (isSet(value)) item[field] = value;
        }

        await store.putItem(this.tables.bookings, item);
        return item;
      },
      { store: this.store, logger: this.logger, operation: 'create_booking', refresh: this.refresh },
    );

    return { booking_ref: bookingRef, message: 'Booking created successfully', details };
  }

  async modifyBooking(bookingRef: string, changes: BookingChanges): Promise<BookingOutcome> {
    this.logger.info({ bookingRef, fields: Object.keys(changes) }, 'Modifying booking');

    const details = await resilientCall(
      async (store) => {
        const booking = await this.findActive(store, bookingRef);

        const updated: Item = { ...booking };
        for (const field of MODIFIABLE_FIELDS) {
          const value = changes[field];
          if (isSet(value)) updated[field] = value;
        }
        checkTripDates(String(updated['trip_start'] ?? ''), String(updated['trip_end'] ?? ''));
        updated['updated_at'] = this.now().toISOString();

        await store.putItem(this.tables.bookings, updated);
        return updated;
      },
      { store: this.store, logger: this.logger, operation: 'modify_booking', refresh: this.refresh },
    );

    return { booking_ref: bookingRef, message: 'Booking modified successfully', details };
  }

  async cancelBooking(bookingRef: string): Promise<BookingOutcome> {
    this.logger.info({ bookingRef }, 'Cancelling booking');

    const details = await resilientCall(
      async (store) => {
        const booking = await this.findActive(store, bookingRef);
        const cancelled: Item = {
          ...booking,
          status: 'cancelled',
          cancelled_at: this.now().toISOString(),
        };
        await store.putItem(this.tables.bookings, cancelled);
        return cancelled;
      },
      { store: this.store, logger: this.logger, operation: 'cancel_booking', refresh: this.refresh },
    );

    return { booking_ref: bookingRef, message: 'Booking cancelled successfully', details };
  }

  private async findActive(store: ItemStore, bookingRef: string): Promise<Item> {
    const [booking] = await store.queryByKey(
      this.tables.bookings,
      { attribute: 'booking_ref', value: bookingRef },
      this.tables.bookingsIndex,
    );
    if (!booking) {
      throw new BookingNotFoundError(bookingRef);
    }
    if (booking['status'] === 'cancelled') {
      throw new BookingCancelledError(bookingRef);
    }
    return booking;
  }
}
