import type { ConciergeConfig } from '@concierge/core';

export const config: ConciergeConfig = {
  app: {
    name: 'Travel Desk',
    description: 'Customer lookup, accommodation search, bookings and flights for a campervan travel desk',
    version: '0.1.0',
  },
  mcp: {
    serverName: 'travel-desk',
    protocolVersion: '2024-11-05',
  },
};
