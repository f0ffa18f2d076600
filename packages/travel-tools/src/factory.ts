import type { ConciergeTool } from '@concierge/core';
import { resolveConfig, type TravelToolsConfig } from './config.js';
import { createCustomerTools } from './tools/customer-tools.js';
import { createAccommodationTools } from './tools/accommodation-tools.js';
import { createBookingTools } from './tools/booking-tools.js';
import { createFlightTools } from './tools/flight-tools.js';
import { createApplianceTools } from './tools/appliance-tools.js';

export interface TravelFactoryOptions {
  prefix: string;
  config?: TravelToolsConfig;
}

export function createTravelTools(options: TravelFactoryOptions): ConciergeTool[] {
  const { prefix } = options;
  const config = resolveConfig(options.config);

  return [
    ...createCustomerTools(prefix, config),
    ...createAccommodationTools(prefix, config),
    ...createBookingTools(prefix, config),
    ...createFlightTools(prefix, config),
    ...createApplianceTools(prefix, config),
  ];
}
