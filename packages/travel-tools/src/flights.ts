import { z } from 'zod';

export const DEFAULT_FLIGHT_API_URL = 'https://test.api.amadeus.com';

export interface FlightSearchParams {
  source: string;
  destination: string;
  departureDate: string;
  returnDate?: string;
  adults: number;
  children: number;
  infants: number;
  nonStop: boolean;
  currencyCode: string;
  travelClass?: string;
  includedAirlineCodes?: string[];
  excludedAirlineCodes?: string[];
  maxPrice?: number;
  oneWay?: boolean;
  max: number;
}

export interface FormattedSegment {
  departure: { airport: string | null; time: string | null };
  arrival: { airport: string | null; time: string | null };
  flight: string;
  duration: string | null;
}

export interface FormattedFlight {
  price: { total: string | null; currency: string | null };
  segments: FormattedSegment[];
}

export interface FlightClientOptions {
  apiKey: string;
  apiSecret: string;
  baseUrl?: string;
}

/** The flight API answered with a non-2xx status */
export class FlightApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
    /** First `detail` from the API's error body, when it sent one */
    readonly detail?: string,
  ) {
    super(message);
    this.name = 'FlightApiError';
  }
}

const tokenSchema = z.object({ access_token: z.string() });

const endpointSchema = z
  .object({ iataCode: z.string().optional(), at: z.string().optional() })
  .partial()
  .optional();

const offerSchema = z.object({
  price: z
    .object({ total: z.string().optional(), currency: z.string().optional() })
    .optional(),
  itineraries: z
    .array(
      z.object({
        segments: z
          .array(
            z.object({
              departure: endpointSchema,
              arrival: endpointSchema,
              carrierCode: z.string().optional(),
              number: z.string().optional(),
              duration: z.string().optional(),
            }),
          )
          .optional(),
      }),
    )
    .optional(),
});

export type FlightOffer = z.infer<typeof offerSchema>;

const offersResponseSchema = z.object({ data: z.array(offerSchema).optional() });

const errorBodySchema = z.object({
  errors: z.array(z.object({ detail: z.string().optional() })).optional(),
});

async function readErrorDetail(res: Response): Promise<string | undefined> {
  const body = errorBodySchema.safeParse(await res.json().catch(() => null));
  return body.success ? body.data.errors?.[0]?.detail : undefined;
}

/**
 * Query parameters for the flight-offers endpoint. Airline lists are sent as
 * the caller gave them.
 */
export function buildSearchQuery(params: FlightSearchParams): URLSearchParams {
  const query = new URLSearchParams({
    originLocationCode: params.source.toUpperCase(),
    destinationLocationCode: params.destination.toUpperCase(),
    departureDate: params.departureDate,
    adults: String(params.adults),
    nonStop: String(params.nonStop),
    currencyCode: params.currencyCode.toUpperCase(),
    max: String(params.max),
  });

  if (params.children > 0) query.set('children', String(params.children));
  if (params.infants > 0) query.set('infants', String(params.infants));
  if (params.travelClass) query.set('travelClass', params.travelClass.toUpperCase());
  if (params.returnDate && !params.oneWay) query.set('returnDate', params.returnDate);
  if (params.includedAirlineCodes?.length) {
    query.set('includedAirlineCodes', params.includedAirlineCodes.map((c) => c.toUpperCase()).join(','));
  }
  if (params.excludedAirlineCodes?.length) {
    query.set('excludedAirlineCodes', params.excludedAirlineCodes.map((c) => c.toUpperCase()).join(','));
  }
  if (params.maxPrice !== undefined) query.set('maxPrice', String(params.maxPrice));

  return query;
}

export function formatFlightOffers(offers: readonly FlightOffer[]): FormattedFlight[] {
  return offers.map((offer) => ({
    price: {
      total: offer.price?.total ?? null,
      currency: offer.price?.currency ?? null,
    },
    segments: (offer.itineraries ?? []).flatMap((itinerary) =>
      (itinerary.segments ?? []).map((segment) => ({
        departure: {
          airport: segment.departure?.iataCode ?? null,
          time: segment.departure?.at ?? null,
        },
        arrival: {
          airport: segment.arrival?.iataCode ?? null,
          time: segment.arrival?.at ?? null,
        },
        flight: `${segment.carrierCode ?? ''} ${segment.number ?? ''}`,
        duration: segment.duration ?? null,
      })),
    ),
  }));
}

/**
 * Client for the flight-offers search API (OAuth2 client credentials).
 */
export class FlightClient {
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly baseUrl: string;

  constructor(options: FlightClientOptions) {
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.baseUrl = (options.baseUrl ?? DEFAULT_FLIGHT_API_URL).replace(/\/+$/, '');
  }

  async getToken(): Promise<string> {
    const res = await fetch(`${this.baseUrl}/v1/security/oauth2/token`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: this.apiKey,
        client_secret: this.apiSecret,
      }).toString(),
    });
    if (!res.ok) throw new FlightApiError(res.status, `Flight API token request failed: ${res.status}`);
    return tokenSchema.parse(await res.json()).access_token;
  }

  async searchOffers(params: FlightSearchParams): Promise<FlightOffer[]> {
    const token = await this.getToken();
    const url = `${this.baseUrl}/v2/shopping/flight-offers?${buildSearchQuery(params).toString()}`;
    const res = await fetch(url, { headers: { Authorization: `Bearer ${token}` } });

    if (!res.ok) {
      const detail = res.status === 400 ? await readErrorDetail(res) : undefined;
      throw new FlightApiError(res.status, `Flight search failed: ${res.status}`, detail);
    }

    return offersResponseSchema.parse(await res.json()).data ?? [];
  }
}
