import type { ConciergeTool } from '@concierge/core';
import { FlightClient, createTravelTools, type TravelSettings } from '@concierge/travel-tools';

export const TOOL_PREFIX = 'travel';

/**
 * The desk's tool set. Flight search stays unconfigured unless both API
 * credentials are present.
 */
export function deskTools(settings: TravelSettings): ConciergeTool[] {
  const { apiKey, apiSecret, baseUrl, currency } = settings.flights;
  const flightClient = apiKey && apiSecret ? new FlightClient({ apiKey, apiSecret, baseUrl }) : undefined;

  return createTravelTools({
    prefix: TOOL_PREFIX,
    config: {
      tables: settings.tables,
      bookingRefPrefix: settings.bookingRefPrefix,
      defaultMaxDistanceKm: settings.defaultMaxDistanceKm,
      flightClient,
      flightCurrency: currency,
    },
  });
}
