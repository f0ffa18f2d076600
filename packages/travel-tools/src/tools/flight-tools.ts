import { createJsonResult, type ConciergeTool, type ToolContext, type ToolResult } from '@concierge/core';
import { z } from 'zod';
import { isIsoDate } from '../bookings.js';
import type { ResolvedTravelConfig } from '../config.js';
import { failure } from '../envelope.js';
import { FlightApiError, formatFlightOffers, type FormattedFlight } from '../flights.js';
import { parseInput } from './shared.js';

export const FLIGHT_SYSTEM_MESSAGE = 'We are currently unable to search for flights. Please try again later.';

export const DEFAULT_MAX_OFFERS = 3;

/** Accepts "NZ,QF" or ["NZ", "QF"] */
const airlineCodes = z
  .union([z.string(), z.array(z.string())])
  .transform((v) => (Array.isArray(v) ? v : v.split(',')).map((c) => c.trim()).filter((c) => c !== ''))
  .optional();

const flightSearchInput = z.object({
  source: z.string().trim().min(1),
  destination: z.string().trim().min(1),
  departure_date: z.string().trim(),
  return_date: z.string().trim().optional(),
  adults: z.number().int().min(1).default(1),
  children: z.number().int().min(0).default(0),
  infants: z.number().int().min(0).default(0),
  non_stop: z.boolean().default(false),
  currency_code: z.string().trim().optional(),
  travel_class: z.enum(['ECONOMY', 'PREMIUM_ECONOMY', 'BUSINESS', 'FIRST']).optional(),
  included_airline_codes: airlineCodes,
  excluded_airline_codes: airlineCodes,
  max_price: z.number().int().positive().optional(),
  one_way: z.boolean().default(false),
  max: z.number().int().min(1).max(250).default(DEFAULT_MAX_OFFERS),
});

interface FlightSearchResponse {
  status: 'success';
  data: { message: string; flights: FormattedFlight[] };
}

export function createFlightTools(prefix: string, config: ResolvedTravelConfig): ConciergeTool[] {
  // ── flight_search ───────────────────────────────────────────
  const flightSearch: ConciergeTool = {
    name: `${prefix}-flight_search`,
    description: 'Search flight offers between two airports (IATA codes) on a date.',
    inputSchema: {
      type: 'object',
      properties: {
        source: { type: 'string', description: 'Origin airport, e.g. "AKL"' },
        destination: { type: 'string', description: 'Destination airport, e.g. "SYD"' },
        departure_date: { type: 'string', description: 'YYYY-MM-DD' },
        return_date: { type: 'string', description: 'YYYY-MM-DD, ignored when one_way is set' },
        adults: { type: 'integer', minimum: 1, default: 1 },
        children: { type: 'integer', minimum: 0, default: 0 },
        infants: { type: 'integer', minimum: 0, default: 0 },
        non_stop: { type: 'boolean', default: false },
        currency_code: { type: 'string', description: `Price currency (default ${config.flightCurrency})` },
        travel_class: { type: 'string', enum: ['ECONOMY', 'PREMIUM_ECONOMY', 'BUSINESS', 'FIRST'] },
        included_airline_codes: {
          type: ['string', 'array'],
          items: { type: 'string' },
          description: 'Carrier codes to include, as a list or comma-separated',
        },
        excluded_airline_codes: {
          type: ['string', 'array'],
          items: { type: 'string' },
          description: 'Carrier codes to exclude, as a list or comma-separated',
        },
        max_price: { type: 'integer', minimum: 1, description: 'Maximum price per traveller' },
        one_way: { type: 'boolean', default: false },
        max: { type: 'integer', minimum: 1, maximum: 250, default: DEFAULT_MAX_OFFERS },
      },
      required: ['source', 'destination', 'departure_date'],
    },

    async handler(input: unknown, ctx: ToolContext): Promise<ToolResult> {
      const parsed = parseInput(flightSearchInput, input);
      if (!parsed.ok) return parsed.result;
      const data = parsed.value;

      const checkReturn = data.return_date !== undefined && !data.one_way;
      if (!isIsoDate(data.departure_date) || (checkReturn && !isIsoDate(data.return_date ?? ''))) {
        return failure('Invalid date format. Use YYYY-MM-DD.');
      }

      const client = config.flightClient;
      if (!client) {
        ctx.logger.error('Flight search requested but no flight API credentials are configured');
        return failure(FLIGHT_SYSTEM_MESSAGE);
      }

      const source = data.source.toUpperCase();
      const destination = data.destination.toUpperCase();
      ctx.logger.info({ source, destination, departureDate: data.departure_date }, 'Flight search');

      try {
        const offers = await client.searchOffers({
          source,
          destination,
          departureDate: data.departure_date,
          returnDate: data.return_date,
          adults: data.adults,
          children: data.children,
          infants: data.infants,
          nonStop: data.non_stop,
          currencyCode: data.currency_code ?? config.flightCurrency,
          travelClass: data.travel_class,
          includedAirlineCodes: data.included_airline_codes,
          excludedAirlineCodes: data.excluded_airline_codes,
          maxPrice: data.max_price,
          oneWay: data.one_way,
          max: data.max,
        });

        const kept = offers.slice(0, data.max);
        const response: FlightSearchResponse =
          kept.length === 0
            ? { status: 'success', data: { message: 'No flights found for the specified criteria.', flights: [] } }
            : {
                status: 'success',
                data: {
                  message: `Found ${kept.length} flights from ${source} to ${destination}`,
                  flights: formatFlightOffers(kept),
                },
              };
        return createJsonResult(response);
      } catch (error) {
        if (error instanceof FlightApiError && error.status === 400 && error.detail) {
          ctx.logger.info({ status: error.status }, error.detail);
          return failure(error.detail);
        }
        ctx.logger.error({ err: error }, 'Flight search failed');
        return failure(FLIGHT_SYSTEM_MESSAGE);
      }
    },
  };

  return [flightSearch];
}
