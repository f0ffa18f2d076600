/**
 * Domain errors raised by the lookup engine, bookings, profile and appliance guides.
 *
 * Caller errors carry a message that is safe to show as-is.
 * {@link SystemUnavailableError} carries the underlying failure as `cause`
 * for the log only.
 */

export type TravelErrorKind =
  | 'invalid_identifier_type'
  | 'location_not_resolvable'
  | 'missing_fields'
  | 'invalid_trip_dates'
  | 'accommodation_not_found'
  | 'booking_not_found'
  | 'booking_cancelled'
  | 'invalid_appliance_type'
  | 'system_unavailable';

export abstract class TravelError extends Error {
  abstract readonly kind: TravelErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidIdentifierTypeError extends TravelError {
  readonly kind = 'invalid_identifier_type';

  constructor(readonly identifierType: string) {
    super(
      `Invalid identifier type: ${identifierType}. Must be one of: booking_ref, contact_phone, vehicle_reg, customer_id`,
    );
  }
}

export class LocationNotResolvableError extends TravelError {
  readonly kind = 'location_not_resolvable';

  constructor(readonly location: string) {
    super(`Could not find coordinates for location: ${location}`);
  }
}

export class MissingFieldsError extends TravelError {
  readonly kind = 'missing_fields';

  constructor(readonly fields: readonly string[]) {
    super(`Missing required fields: ${fields.join(', ')}`);
  }
}

export class InvalidTripDatesError extends TravelError {
  readonly kind = 'invalid_trip_dates';
}

export class AccommodationNotFoundError extends TravelError {
  readonly kind = 'accommodation_not_found';

  constructor(readonly accommodationId: string) {
    super(`Accommodation with ID ${accommodationId} not found`);
  }
}

export class BookingNotFoundError extends TravelError {
  readonly kind = 'booking_not_found';

  constructor(readonly bookingRef: string) {
    super(`No booking found with reference ${bookingRef}`);
  }
}

export class BookingCancelledError extends TravelError {
  readonly kind = 'booking_cancelled';

  constructor(readonly bookingRef: string) {
    super(`Booking ${bookingRef} has already been cancelled`);
  }
}

export class InvalidApplianceTypeError extends TravelError {
  readonly kind = 'invalid_appliance_type';

  constructor(
    readonly applianceType: string,
    known: readonly string[],
  ) {
    super(`Invalid appliance type: ${applianceType}. Must be one of: ${known.join(', ')}`);
  }
}

export class SystemUnavailableError extends TravelError {
  readonly kind = 'system_unavailable';
}

export function isTravelError(error: unknown): error is TravelError {
  return error instanceof TravelError;
}
