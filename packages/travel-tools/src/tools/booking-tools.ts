import type { ConciergeTool, ToolContext, ToolResult } from '@concierge/core';
import { z } from 'zod';
import { BookingManager, type BookingOutcome } from '../bookings.js';
import type { ResolvedTravelConfig } from '../config.js';
import { failure, success } from '../envelope.js';
import { formatBooking } from '../formatter.js';
import type { BookingChanges } from '../types.js';
import { errorResult, parseInput } from './shared.js';

export const BOOKING_SYSTEM_MESSAGE =
  'We are currently unable to process your booking request. Please try again later.';

const ACTIONS = ['create', 'modify', 'cancel'] as const;
type BookingAction = (typeof ACTIONS)[number];

const text = z.string().trim().optional();

const bookingManagerInput = z.object({
  action: z.string(),
  booking_ref: text,
  contact_phone: text,
  accommodation_id: text,
  trip_start: text,
  trip_end: text,
  customer_name: text,
  site_type: text,
  vehicle_reg: text,
  num_guests: z.number().int().positive().optional(),
  special_requests: text,
  customer_booking_ref: text,
});

type BookingManagerInput = z.output<typeof bookingManagerInput>;

function isAction(value: string): value is BookingAction {
  return (ACTIONS as readonly string[]).includes(value);
}

function changesFrom(input: BookingManagerInput): BookingChanges {
  return {
    trip_start: input.trip_start,
    trip_end: input.trip_end,
    site_type: input.site_type,
    num_guests: input.num_guests,
    special_requests: input.special_requests,
    customer_name: input.customer_name,
    vehicle_reg: input.vehicle_reg,
  };
}

function hasChanges(changes: BookingChanges): boolean {
  return Object.values(changes).some((value) => value !== undefined && value !== '');
}

function present(outcome: BookingOutcome) {
  return {
    booking_ref: outcome.booking_ref,
    message: outcome.message,
    details: formatBooking(outcome.details),
  };
}

export function createBookingTools(prefix: string, config: ResolvedTravelConfig): ConciergeTool[] {
  // ── booking_manager ─────────────────────────────────────────
  const bookingManager: ConciergeTool = {
    name: `${prefix}-booking_manager`,
    description:
      'Create, modify or cancel an accommodation booking. ' +
      'create needs contact_phone, accommodation_id, trip_start and trip_end; modify and cancel need booking_ref.',
    inputSchema: {
      type: 'object',
      properties: {
        action: { type: 'string', enum: [...ACTIONS], description: 'What to do' },
        booking_ref: { type: 'string', description: 'Existing booking reference (modify, cancel)' },
        contact_phone: { type: 'string', description: 'Customer contact phone' },
        accommodation_id: { type: 'string', description: 'Accommodation to book' },
        trip_start: { type: 'string', description: 'Arrival date, YYYY-MM-DD' },
        trip_end: { type: 'string', description: 'Departure date, YYYY-MM-DD' },
        customer_name: { type: 'string' },
        site_type: { type: 'string', description: 'e.g. "powered", "cabin"' },
        vehicle_reg: { type: 'string', description: 'Vehicle registration' },
        num_guests: { type: 'integer', minimum: 1 },
        special_requests: { type: 'string' },
        customer_booking_ref: { type: 'string', description: "The customer's own reference" },
      },
      required: ['action'],
    },

    async handler(input: unknown, ctx: ToolContext): Promise<ToolResult> {
      const parsed = parseInput(bookingManagerInput, input);
      if (!parsed.ok) return parsed.result;
      const data = parsed.value;

      if (!isAction(data.action)) {
        return failure(`Invalid action: ${data.action}. Must be one of: ${ACTIONS.join(', ')}`);
      }

      const manager = new BookingManager({
        store: ctx.store,
        logger: ctx.logger,
        tables: config.tables,
        prefix: config.bookingRefPrefix,
        random: config.random,
        now: config.now,
      });

      try {
        switch (data.action) {
          case 'create':
            return success(present(await manager.createBooking(data)));

          case 'modify': {
            if (!data.booking_ref) return failure('Booking reference required for modification');
            const changes = changesFrom(data);
            if (!hasChanges(changes)) return failure('No changes provided for modification');
            return success(present(await manager.modifyBooking(data.booking_ref, changes)));
          }

          case 'cancel':
            if (!data.booking_ref) return failure('Booking reference required for cancellation');
            return success(present(await manager.cancelBooking(data.booking_ref)));
        }
      } catch (error) {
        return errorResult(error, ctx.logger, BOOKING_SYSTEM_MESSAGE);
      }
    },
  };

  return [bookingManager];
}
