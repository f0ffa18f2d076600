import { describe, it, expect, beforeEach } from 'vitest';
import { createSilentLogger, type InMemoryItemStore } from '@concierge/core';
import { BookingManager, generateBookingRef, isIsoDate } from '../bookings.js';
import { DEFAULT_TABLES } from '../tables.js';
import { FailingStore, createTravelStore } from '../testing.js';
import {
  AccommodationNotFoundError,
  BookingCancelledError,
  BookingNotFoundError,
  InvalidTripDatesError,
  MissingFieldsError,
  SystemUnavailableError,
} from '../errors.js';

const tables = DEFAULT_TABLES;
const NOW = new Date(2025, 2, 7, 10, 30);
const LATER = new Date(2025, 2, 8, 9, 0);

let store: InMemoryItemStore;
let clock: Date;

function manager(overrides?: { prefix?: string; store?: FailingStore }): BookingManager {
  return new BookingManager({
    store: overrides?.store ?? store,
    logger: createSilentLogger(),
    tables,
    prefix: overrides?.prefix,
    random: () => 0,
    now: () => clock,
  });
}

const required = {
  contact_phone: '021555001',
  accommodation_id: 'ACC1',
  trip_start: '2025-04-01',
  trip_end: '2025-04-05',
};

beforeEach(async () => {
  clock = NOW;
  store = createTravelStore();
  await store.putItem(tables.accommodations, {
    accommodation_id: 'ACC1',
    accommodation_name: 'Lakeside Holiday Park',
    accommodation_location: 'Taupo',
  });
  await store.putItem(tables.accommodations, { accommodation_id: 'BARE' });
});

describe('generateBookingRef', () => {
  it('formats prefix, local date and suffix', () => {
    expect(generateBookingRef('TRV', NOW, () => 0)).toBe('TRV-20250307-AAAAA');
    expect(generateBookingRef('TRV', NOW, () => 0.999)).toBe('TRV-20250307-99999');
  });

  it('draws suffix characters from A-Z and 0-9', () => {
    for (let i = 0; i < 50; i++) {
      expect(generateBookingRef('TRV', new Date())).toMatch(/^TRV-\d{8}-[A-Z0-9]{5}$/);
    }
  });
});

describe('isIsoDate', () => {
  it('accepts real calendar dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
  });

  it('rejects impossible or malformed dates', () => {
    expect(isIsoDate('2025-02-29')).toBe(false);
    expect(isIsoDate('2025-13-01')).toBe(false);
    expect(isIsoDate('1/4/2025')).toBe(false);
  });
});

describe('createBooking', () => {
  it('stores a confirmed booking with the accommodation snapshot', async () => {
    const outcome = await manager().createBooking({ ...required, customer_name: 'Test Customer', num_guests: 2 });

    expect(outcome.booking_ref).toBe('TRV-20250307-AAAAA');
    expect(outcome.message).toBe('Booking created successfully');
    expect(outcome.details).toEqual({
      booking_ref: 'TRV-20250307-AAAAA',
      contact_phone: '021555001',
      accommodation_id: 'ACC1',
      accommodation_name: 'Lakeside Holiday Park',
      accommodation_location: 'Taupo',
      trip_start: '2025-04-01',
      trip_end: '2025-04-05',
      status: 'confirmed',
      created_at: NOW.toISOString(),
      customer_name: 'Test Customer',
      num_guests: 2,
    });

    const stored = await store.getItem(tables.bookings, {
      contact_phone: '021555001',
      booking_ref: 'TRV-20250307-AAAAA',
    });
    expect(stored).toEqual(outcome.details);
  });

  it('omits unset optional fields', async () => {
    const outcome = await manager().createBooking({ ...required, special_requests: '' });

    expect(Object.keys(outcome.details)).not.toContain('special_requests');
    expect(Object.keys(outcome.details)).not.toContain('customer_name');
  });

  it('uses the configured prefix', async () => {
    const outcome = await manager({ prefix: 'NZH' }).createBooking(required);
    expect(outcome.booking_ref).toBe('NZH-20250307-AAAAA');
  });

  it('falls back to placeholder snapshot text', async () => {
    const outcome = await manager().createBooking({ ...required, accommodation_id: 'BARE' });

    expect(outcome.details['accommodation_name']).toBe('Unknown Accommodation');
    expect(outcome.details['accommodation_location']).toBe('Unknown Location');
  });

  it('keeps the snapshot when the accommodation changes later', async () => {
    const outcome = await manager().createBooking(required);
    await store.putItem(tables.accommodations, {
      accommodation_id: 'ACC1',
      accommodation_name: 'Renamed Park',
      accommodation_location: 'Turangi',
    });

    const stored = await store.getItem(tables.bookings, {
      contact_phone: '021555001',
      booking_ref: outcome.booking_ref,
    });
    expect(stored?.['accommodation_name']).toBe('Lakeside Holiday Park');
  });

  it('lists every missing field in order', async () => {
    const error = await manager()
      .createBooking({ accommodation_id: 'ACC1', trip_end: '' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MissingFieldsError);
    expect(error instanceof MissingFieldsError ? error.fields : []).toEqual(['contact_phone', 'trip_start', 'trip_end']);
    expect(error instanceof Error ? error.message : '').toBe('Missing required fields: contact_phone, trip_start, trip_end');
  });

  it('rejects an unknown accommodation', async () => {
    await expect(manager().createBooking({ ...required, accommodation_id: 'NOPE' })).rejects.toThrow(
      new AccommodationNotFoundError('NOPE').message,
    );
    expect(store.size(tables.bookings)).toBe(0);
  });

  it('rejects malformed or reversed trip dates', async () => {
    await expect(manager().createBooking({ ...required, trip_start: '01/04/2025' })).rejects.toBeInstanceOf(
      InvalidTripDatesError,
    );
    await expect(
      manager().createBooking({ ...required, trip_start: '2025-04-05', trip_end: '2025-04-01' }),
    ).rejects.toThrow('trip_end must not be before trip_start');
  });

  it('accepts a same-day trip', async () => {
    const outcome = await manager().createBooking({ ...required, trip_end: '2025-04-01' });
    expect(outcome.details['trip_end']).toBe('2025-04-01');
  });

  it('writes one booking after retrying an expired credential', async () => {
    const failing = new FailingStore(store, 1);

    const outcome = await manager({ store: failing }).createBooking(required);

    expect(outcome.booking_ref).toBe('TRV-20250307-AAAAA');
    expect(store.size(tables.bookings)).toBe(1);
    expect(failing.refreshes).toBe(1);
  });

  it('reports SystemUnavailable after two expiries', async () => {
    const failing = new FailingStore(store, 2);

    await expect(manager({ store: failing }).createBooking(required)).rejects.toBeInstanceOf(SystemUnavailableError);
    expect(store.size(tables.bookings)).toBe(0);
  });
});

describe('modifyBooking', () => {
  it('merges allowed fields and stamps updated_at', async () => {
    const { booking_ref } = await manager().createBooking(required);
    clock = LATER;

    const outcome = await manager().modifyBooking(booking_ref, { trip_end: '2025-04-07', num_guests: 3 });

    expect(outcome.message).toBe('Booking modified successfully');
    expect(outcome.details).toMatchObject({
      trip_start: '2025-04-01',
      trip_end: '2025-04-07',
      num_guests: 3,
      accommodation_name: 'Lakeside Holiday Park',
      status: 'confirmed',
      created_at: NOW.toISOString(),
      updated_at: LATER.toISOString(),
    });
    const stored = await store.getItem(tables.bookings, { contact_phone: '021555001', booking_ref });
    expect(stored).toEqual(outcome.details);
  });

  it('validates the merged dates', async () => {
    const { booking_ref } = await manager().createBooking(required);

    await expect(manager().modifyBooking(booking_ref, { trip_end: '2025-03-30' })).rejects.toBeInstanceOf(
      InvalidTripDatesError,
    );
  });

  it('reports an unknown reference', async () => {
    await expect(manager().modifyBooking('TRV-20250101-ZZZZZ', { num_guests: 2 })).rejects.toBeInstanceOf(
      BookingNotFoundError,
    );
  });

  it('refuses to modify a cancelled booking', async () => {
    const { booking_ref } = await manager().createBooking(required);
    await manager().cancelBooking(booking_ref);

    await expect(manager().modifyBooking(booking_ref, { num_guests: 2 })).rejects.toBeInstanceOf(
      BookingCancelledError,
    );
  });
});

describe('cancelBooking', () => {
  it('marks the booking cancelled', async () => {
    const { booking_ref } = await manager().createBooking(required);
    clock = LATER;

    const outcome = await manager().cancelBooking(booking_ref);

    expect(outcome.message).toBe('Booking cancelled successfully');
    expect(outcome.details['status']).toBe('cancelled');
    expect(outcome.details['cancelled_at']).toBe(LATER.toISOString());
  });

  it('refuses to cancel twice', async () => {
    const { booking_ref } = await manager().createBooking(required);
    await manager().cancelBooking(booking_ref);

    await expect(manager().cancelBooking(booking_ref)).rejects.toThrow(
      `Booking ${booking_ref} has already been cancelled`,
    );
  });
});
