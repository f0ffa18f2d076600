import type { ConciergeTool, ToolContext, ToolResult } from '@concierge/core';
import { z } from 'zod';
import type { ResolvedTravelConfig } from '../config.js';
import { notFound, success } from '../envelope.js';
import { formatBooking, formatFlightProfile, formatVehicle } from '../formatter.js';
import { LookupEngine } from '../lookup-engine.js';
import { customerProfile } from '../profile.js';
import { IDENTIFIER_TYPES, type CustomerMatch } from '../types.js';
import { errorResult, parseInput } from './shared.js';

export const CUSTOMER_SYSTEM_MESSAGE =
  'We are currently unable to retrieve customer information. Please try again later.';

export const PROFILE_SYSTEM_MESSAGE =
  'We are currently unable to retrieve your booking. Please try again later.';

// The type stays a plain string so an unknown one reaches the engine and
// comes back as a named error rather than a schema failure.
const customerLookupInput = z.object({
  identifier: z.string().trim().min(1),
  identifier_type: z.string().trim().min(1),
});

const customerProfileInput = z.object({
  customer_id: z.string().trim().min(1),
});

function formatMatch(match: CustomerMatch) {
  return {
    customer: match.source === 'profiles' ? formatFlightProfile(match.customer) : formatBooking(match.customer),
    vehicle: match.vehicle ? formatVehicle(match.vehicle) : null,
  };
}

export function createCustomerTools(prefix: string, config: ResolvedTravelConfig): ConciergeTool[] {
  // ── customer_lookup ─────────────────────────────────────────
  const customerLookup: ConciergeTool = {
    name: `${prefix}-customer_lookup`,
    description:
      'Find a customer by booking reference, contact phone, vehicle registration or customer ID. ' +
      'Returns the customer record and their vehicle when one is on file.',
    inputSchema: {
      type: 'object',
      properties: {
        identifier: { type: 'string', description: 'The value to look up' },
        identifier_type: {
          type: 'string',
          description: `What the identifier is: one of ${IDENTIFIER_TYPES.join(', ')}`,
        },
      },
      required: ['identifier', 'identifier_type'],
    },

    async handler(input: unknown, ctx: ToolContext): Promise<ToolResult> {
      const parsed = parseInput(customerLookupInput, input);
      if (!parsed.ok) return parsed.result;

      const engine = new LookupEngine({
        store: ctx.store,
        logger: ctx.logger,
        tables: config.tables,
        geoIndex: config.geoIndex,
      });

      try {
        const result = await engine.lookupCustomer({
          type: parsed.value.identifier_type,
          value: parsed.value.identifier,
        });
        switch (result.kind) {
          case 'customer':
            return success(formatMatch(result.match));
          case 'not_found':
            return notFound(result.message);
          case 'accommodations':
            return errorResult(new Error('Lookup returned accommodation records'), ctx.logger, CUSTOMER_SYSTEM_MESSAGE);
        }
      } catch (error) {
        return errorResult(error, ctx.logger, CUSTOMER_SYSTEM_MESSAGE);
      }
    },
  };

  // ── customer_profile ────────────────────────────────────────
  const customerProfileTool: ConciergeTool = {
    name: `${prefix}-customer_profile`,
    description:
      "List a customer's upcoming flights, soonest first. Spaces, dots and dashes in the ID are ignored.",
    inputSchema: {
      type: 'object',
      properties: {
        customer_id: { type: 'string', description: 'Customer ID, e.g. "C-1001"' },
      },
      required: ['customer_id'],
    },

    async handler(input: unknown, ctx: ToolContext): Promise<ToolResult> {
      const parsed = parseInput(customerProfileInput, input);
      if (!parsed.ok) return parsed.result;

      try {
        const result = await customerProfile(parsed.value.customer_id, {
          store: ctx.store,
          logger: ctx.logger,
          tables: config.tables,
          now: config.now,
        });
        if (result.kind === 'not_found') return notFound(result.message);
        return success({
          customer_id: result.customerId,
          flights: result.flights.map(formatFlightProfile),
        });
      } catch (error) {
        return errorResult(error, ctx.logger, PROFILE_SYSTEM_MESSAGE);
      }
    },
  };

  return [customerLookup, customerProfileTool];
}
