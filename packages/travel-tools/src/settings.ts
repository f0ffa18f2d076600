import { z } from 'zod';
import { DEFAULT_FLIGHT_API_URL } from './flights.js';
import { DEFAULT_BOOKING_REF_PREFIX } from './bookings.js';
import { DEFAULT_MAX_DISTANCE_KM } from './lookup-engine.js';
import { DEFAULT_TABLES } from './tables.js';
import type { TravelTables } from './types.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/** Unset and empty variables both mean "use the default" */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const settingsSchema = z
  .object({
    DYNAMODB_BOOKINGS_TABLE: optionalText,
    DYNAMODB_BOOKINGS_INDEX: optionalText,
    DYNAMODB_VEHICLES_TABLE: optionalText,
    DYNAMODB_ACCOMMODATION_TABLE: optionalText,
    DYNAMODB_PROFILE_TABLE: optionalText,
    AWS_REGION: optionalText,
    TABLE_PREFIX: optionalText,
    STORE_BACKEND: z.enum(['dynamodb', 'memory']).default('dynamodb'),
    BOOKING_REF_PREFIX: z
      .string()
      .regex(/^[A-Z]{2,6}$/, 'must be 2-6 upper-case letters')
      .default(DEFAULT_BOOKING_REF_PREFIX),
    DEFAULT_MAX_DISTANCE_KM: z.coerce.number().positive().default(DEFAULT_MAX_DISTANCE_KM),
    AMADEUS_API_KEY: optionalText,
    AMADEUS_API_SECRET: optionalText,
    AMADEUS_BASE_URL: z.string().url().default(DEFAULT_FLIGHT_API_URL),
    FLIGHT_CURRENCY: z
      .string()
      .regex(/^[A-Za-z]{3}$/, 'must be a three-letter currency code')
      .transform((v) => v.toUpperCase())
      .default('NZD'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  })
  .transform((env) => {
    const bookings = env.DYNAMODB_BOOKINGS_TABLE ?? DEFAULT_TABLES.bookings;
    const tables: TravelTables = {
      bookings,
      bookingsIndex: env.DYNAMODB_BOOKINGS_INDEX ?? `${bookings}-index`,
      vehicles: env.DYNAMODB_VEHICLES_TABLE ?? DEFAULT_TABLES.vehicles,
      accommodations: env.DYNAMODB_ACCOMMODATION_TABLE ?? DEFAULT_TABLES.accommodations,
      profiles: env.DYNAMODB_PROFILE_TABLE ?? DEFAULT_TABLES.profiles,
    };
    return {
      tables,
      region: env.AWS_REGION,
      tablePrefix: env.TABLE_PREFIX,
      storeBackend: env.STORE_BACKEND,
      bookingRefPrefix: env.BOOKING_REF_PREFIX,
      defaultMaxDistanceKm: env.DEFAULT_MAX_DISTANCE_KM,
      flights: {
        apiKey: env.AMADEUS_API_KEY,
        apiSecret: env.AMADEUS_API_SECRET,
        baseUrl: env.AMADEUS_BASE_URL,
        currency: env.FLIGHT_CURRENCY,
      },
      logLevel: env.LOG_LEVEL,
      port: env.PORT,
    };
  });

export type TravelSettings = z.output<typeof settingsSchema>;

export class SettingsError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid settings:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'SettingsError';
  }
}

/**
 * Parse settings from environment variables.
 *
 * @throws SettingsError listing every invalid variable
 */
export function parseSettings(env: Record<string, unknown>): TravelSettings {
  const result = settingsSchema.safeParse(env);
  if (!result.success) {
    throw new SettingsError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}
