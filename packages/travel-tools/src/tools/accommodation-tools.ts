import type { ConciergeTool, ToolContext, ToolResult } from '@concierge/core';
import { z } from 'zod';
import type { ResolvedTravelConfig } from '../config.js';
import { notFound, success } from '../envelope.js';
import { formatAccommodations } from '../formatter.js';
import { LookupEngine } from '../lookup-engine.js';
import { errorResult, parseInput } from './shared.js';

export const ACCOMMODATION_SYSTEM_MESSAGE =
  'We are currently unable to search for accommodation. Please try again later.';

const accommodationFinderInput = z.object({
  location: z.string().trim().min(1),
  family_friendly: z.boolean().optional(),
  pet_friendly: z.boolean().optional(),
  powered_site: z.boolean().optional(),
  max_distance: z.number().positive().optional(),
});

export function createAccommodationTools(prefix: string, config: ResolvedTravelConfig): ConciergeTool[] {
  // ── accommodation_finder ────────────────────────────────────
  const accommodationFinder: ConciergeTool = {
    name: `${prefix}-accommodation_finder`,
    description:
      'Find accommodation at or near a location. Options whose location names the place come first; ' +
      'otherwise options within max_distance km are returned nearest first, with distance_km.',
    inputSchema: {
      type: 'object',
      properties: {
        location: { type: 'string', description: 'Town or area, e.g. "Queenstown"' },
        family_friendly: { type: 'boolean', description: 'Only family-friendly options' },
        pet_friendly: { type: 'boolean', description: 'Only pet-friendly options' },
        powered_site: { type: 'boolean', description: 'Only options with powered sites available' },
        max_distance: {
          type: 'number',
          description: `Search radius in km when nothing matches by name (default ${config.defaultMaxDistanceKm})`,
        },
      },
      required: ['location'],
    },

    async handler(input: unknown, ctx: ToolContext): Promise<ToolResult> {
      const parsed = parseInput(accommodationFinderInput, input);
      if (!parsed.ok) return parsed.result;
      const { location, family_friendly, pet_friendly, powered_site, max_distance } = parsed.value;

      const engine = new LookupEngine({
        store: ctx.store,
        logger: ctx.logger,
        tables: config.tables,
        geoIndex: config.geoIndex,
        defaultMaxDistanceKm: config.defaultMaxDistanceKm,
      });

      try {
        const result = await engine.searchAccommodation({
          location,
          filter: { family_friendly, pet_friendly, powered_site },
          maxDistanceKm: max_distance,
        });
        switch (result.kind) {
          case 'accommodations':
            return success(formatAccommodations(result.records));
          case 'not_found':
            return notFound(result.message);
          case 'customer':
            return errorResult(new Error('Search returned a customer record'), ctx.logger, ACCOMMODATION_SYSTEM_MESSAGE);
        }
      } catch (error) {
        return errorResult(error, ctx.logger, ACCOMMODATION_SYSTEM_MESSAGE);
      }
    },
  };

  return [accommodationFinder];
}
