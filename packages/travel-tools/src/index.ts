// @concierge/travel-tools public API

// Factory
export { createTravelTools, type TravelFactoryOptions } from './factory.js';
export { resolveConfig, type TravelToolsConfig, type ResolvedTravelConfig } from './config.js';

// Settings
export { parseSettings, SettingsError, type TravelSettings } from './settings.js';

// Seed
export { seedItems, parseSeed, SEED_MARKER_ID, type TravelSeed } from './seed.js';

// Types
export type {
  TravelTables,
  IdentifierType,
  Identifier,
  SearchFilter,
  LocationSearch,
  LookupRequest,
  LookupResult,
  CustomerMatch,
  SearchPhase,
  GeoPlace,
  BookingFields,
  BookingChanges,
  BookingStatus,
  Envelope,
  NotFoundResponse,
} from './types.js';
export { IDENTIFIER_TYPES } from './types.js';

// Errors
export {
  TravelError,
  InvalidIdentifierTypeError,
  LocationNotResolvableError,
  MissingFieldsError,
  InvalidTripDatesError,
  AccommodationNotFoundError,
  BookingNotFoundError,
  BookingCancelledError,
  InvalidApplianceTypeError,
  SystemUnavailableError,
  isTravelError,
  type TravelErrorKind,
} from './errors.js';

// Tables
export { DEFAULT_TABLES, DEFAULT_BOOKINGS_TABLE, SEED_MARKER_TABLE, travelTableSchemas } from './tables.js';

// Engine and services
export {
  LookupEngine,
  DEFAULT_MAX_DISTANCE_KM,
  CUSTOMER_NOT_FOUND_MESSAGE,
  normalizeCustomerId,
  buildSearchFilter,
  type LookupEngineOptions,
} from './lookup-engine.js';
export { GeoIndex, defaultGeoIndex, haversineKm, parseCoordinate, parsePlaces } from './geo-index.js';
export {
  ApplianceGuides,
  defaultApplianceGuides,
  parseApplianceGuides,
  type ApplianceGuide,
  type Troubleshooting,
} from './appliance-guides.js';
export { resilientCall, type ResilientCallOptions, type CredentialRefresh } from './resilient-call.js';
export { BookingManager, generateBookingRef, DEFAULT_BOOKING_REF_PREFIX, type BookingOutcome } from './bookings.js';
export { customerProfile, type ProfileResult } from './profile.js';
export {
  FlightClient,
  FlightApiError,
  DEFAULT_FLIGHT_API_URL,
  buildSearchQuery,
  formatFlightOffers,
  type FlightSearchParams,
  type FormattedFlight,
} from './flights.js';
export {
  formatAccommodation,
  formatAccommodations,
  formatBooking,
  formatVehicle,
  formatFlightProfile,
  type PublicRecord,
} from './formatter.js';

// Testing helpers
export { createTravelStore, makeTestCtx, findTool, readJson, FailingStore } from './testing.js';

// Individual tool creators (for custom composition)
export { createCustomerTools } from './tools/customer-tools.js';
export { createAccommodationTools } from './tools/accommodation-tools.js';
export { createBookingTools } from './tools/booking-tools.js';
export { createFlightTools } from './tools/flight-tools.js';
export { createApplianceTools } from './tools/appliance-tools.js';
