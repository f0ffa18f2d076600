import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConciergeServer, createSilentLogger } from '@concierge/core';
import { createFlightTools, FLIGHT_SYSTEM_MESSAGE } from '../tools/flight-tools.js';
import { resolveConfig } from '../config.js';
import { FlightClient } from '../flights.js';
import { GeoIndex } from '../geo-index.js';
import { createTravelStore, findTool, makeTestCtx, readJson } from '../testing.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const client = new FlightClient({ apiKey: 'test-key', apiSecret: 'test-secret', baseUrl: 'https://flights.test' });
const geoIndex = new GeoIndex([]);

const flightSearch = findTool(createFlightTools('travel', resolveConfig({ geoIndex, flightClient: client })), 'travel-flight_search');

const ctx = makeTestCtx();

const offer = {
  price: { total: '450.00', currency: 'NZD' },
  itineraries: [
    {
      segments: [
        {
          departure: { iataCode: 'AKL', at: '2025-07-01T08:00:00' },
          arrival: { iataCode: 'SYD', at: '2025-07-01T09:30:00' },
          carrierCode: 'NZ',
          number: '103',
          duration: 'PT3H30M',
        },
      ],
    },
  ],
};

function respondWith(status: number, body: unknown) {
  mockFetch
    .mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ access_token: 'test-token' }) })
    .mockResolvedValueOnce({ ok: status < 400, status, json: async () => body });
}

function searchUrl(): URL {
  return new URL(String(mockFetch.mock.calls[1]?.[0]));
}

beforeEach(() => {
  mockFetch.mockReset();
});

describe('flight_search', () => {
  it('returns formatted offers with a summary', async () => {
    respondWith(200, { data: [offer] });

    const result = await flightSearch.handler(
      { source: 'akl', destination: 'syd', departure_date: '2025-07-01' },
      ctx,
    );

    expect(result.isError).toBeUndefined();
    expect(readJson(result)).toEqual({
      status: 'success',
      data: {
        message: 'Found 1 flights from AKL to SYD',
        flights: [
          {
            price: { total: '450.00', currency: 'NZD' },
            segments: [
              {
                departure: { airport: 'AKL', time: '2025-07-01T08:00:00' },
                arrival: { airport: 'SYD', time: '2025-07-01T09:30:00' },
                flight: 'NZ 103',
                duration: 'PT3H30M',
              },
            ],
          },
        ],
      },
    });
  });

  it('keeps at most max offers', async () => {
    respondWith(200, { data: [offer, offer] });

    const result = await flightSearch.handler(
      { source: 'AKL', destination: 'SYD', departure_date: '2025-07-01', max: 1 },
      ctx,
    );

    const body = readJson(result);
    expect(body).toMatchObject({ status: 'success', data: { message: 'Found 1 flights from AKL to SYD' } });
    expect(searchUrl().searchParams.get('max')).toBe('1');
  });

  it('sends defaults for omitted options', async () => {
    respondWith(200, { data: [] });

    await flightSearch.handler({ source: 'AKL', destination: 'SYD', departure_date: '2025-07-01' }, ctx);

    const params = searchUrl().searchParams;
    expect(params.get('adults')).toBe('1');
    expect(params.get('nonStop')).toBe('false');
    expect(params.get('currencyCode')).toBe('NZD');
    expect(params.get('max')).toBe('3');
    expect(params.has('children')).toBe(false);
  });

  it('splits comma-separated airline codes', async () => {
    respondWith(200, { data: [] });

    await flightSearch.handler(
      { source: 'AKL', destination: 'SYD', departure_date: '2025-07-01', included_airline_codes: 'nz, qf' },
      ctx,
    );

    expect(searchUrl().searchParams.get('includedAirlineCodes')).toBe('NZ,QF');
  });

  it('takes airline codes as a list through the protocol', async () => {
    const server = new ConciergeServer({
      config: {
        app: { name: 'Flights', description: 'Flight search', version: '1.0.0' },
        mcp: { serverName: 'flights', protocolVersion: '2024-11-05' },
      },
      store: createTravelStore(),
      logger: createSilentLogger(),
      tools: [flightSearch],
    });
    respondWith(200, { data: [] });

    const response = await server.fetch(
      new Request('http://localhost/mcp', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          jsonrpc: '2.0',
          id: 1,
          method: 'tools/call',
          params: {
            name: 'travel-flight_search',
            arguments: {
              source: 'AKL',
              destination: 'SYD',
              departure_date: '2025-07-01',
              included_airline_codes: ['NZ', 'QF'],
            },
          },
        }),
      }),
    );
    const body = await response.json();

    expect(body.error).toBeUndefined();
    expect(body.result.isError).toBeUndefined();
    expect(searchUrl().searchParams.get('includedAirlineCodes')).toBe('NZ,QF');
  });

  it('says so when nothing matches', async () => {
    respondWith(200, { data: [] });

    const result = await flightSearch.handler(
      { source: 'AKL', destination: 'SYD', departure_date: '2025-07-01' },
      ctx,
    );

    expect(readJson(result)).toEqual({
      status: 'success',
      data: { message: 'No flights found for the specified criteria.', flights: [] },
    });
  });

  it('rejects a malformed departure date without calling the API', async () => {
    const result = await flightSearch.handler(
      { source: 'AKL', destination: 'SYD', departure_date: '01/07/2025' },
      ctx,
    );

    expect(readJson(result)).toEqual({ status: 'error', response: 'Invalid date format. Use YYYY-MM-DD.' });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('checks the return date only for return trips', async () => {
    const bad = await flightSearch.handler(
      { source: 'AKL', destination: 'SYD', departure_date: '2025-07-01', return_date: '2025-13-01' },
      ctx,
    );
    expect(readJson(bad)).toEqual({ status: 'error', response: 'Invalid date format. Use YYYY-MM-DD.' });

    respondWith(200, { data: [] });
    const oneWay = await flightSearch.handler(
      { source: 'AKL', destination: 'SYD', departure_date: '2025-07-01', return_date: '2025-13-01', one_way: true },
      ctx,
    );
    expect(oneWay.isError).toBeUndefined();
    expect(searchUrl().searchParams.has('returnDate')).toBe(false);
  });

  it('passes on the API detail for a rejected search', async () => {
    respondWith(400, { errors: [{ detail: 'Departure date is in the past' }] });

    const result = await flightSearch.handler(
      { source: 'AKL', destination: 'SYD', departure_date: '2020-01-01' },
      ctx,
    );

    expect(readJson(result)).toEqual({ status: 'error', response: 'Departure date is in the past' });
  });

  it('hides other API failures behind a generic message', async () => {
    respondWith(503, {});

    const result = await flightSearch.handler(
      { source: 'AKL', destination: 'SYD', departure_date: '2025-07-01' },
      ctx,
    );

    expect(result.isError).toBe(true);
    expect(readJson(result)).toEqual({ status: 'error', response: FLIGHT_SYSTEM_MESSAGE });
  });

  it('is unavailable without a configured client', async () => {
    const unconfigured = findTool(createFlightTools('travel', resolveConfig({ geoIndex })), 'travel-flight_search');

    const result = await unconfigured.handler(
      { source: 'AKL', destination: 'SYD', departure_date: '2025-07-01' },
      ctx,
    );

    expect(readJson(result)).toEqual({ status: 'error', response: FLIGHT_SYSTEM_MESSAGE });
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
