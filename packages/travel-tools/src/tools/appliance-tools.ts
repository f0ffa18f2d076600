import type { ConciergeTool, ToolContext, ToolResult } from '@concierge/core';
import { z } from 'zod';
import type { ResolvedTravelConfig } from '../config.js';
import { success } from '../envelope.js';
import { errorResult, parseInput } from './shared.js';

export const APPLIANCE_SYSTEM_MESSAGE =
  'We are currently unable to provide troubleshooting assistance. Please try again later.';

const applianceTroubleshootingInput = z.object({
  appliance_type: z.string().trim().min(1),
  issue_description: z.string().trim().min(1),
  vehicle_model: z.string().trim().optional(),
});

export function createApplianceTools(prefix: string, config: ResolvedTravelConfig): ConciergeTool[] {
  const appliances = config.applianceGuides.appliances();

  // ── appliance_troubleshooting ───────────────────────────────
  const applianceTroubleshooting: ConciergeTool = {
    name: `${prefix}-appliance_troubleshooting`,
    description: 'Troubleshooting steps for campervan appliance issues.',
    inputSchema: {
      type: 'object',
      properties: {
        appliance_type: { type: 'string', description: `One of: ${appliances.join(', ')}` },
        issue_description: { type: 'string', description: 'What is going wrong, e.g. "fridge is not_cooling"' },
        vehicle_model: { type: 'string', description: 'Campervan model, if known' },
      },
      required: ['appliance_type', 'issue_description'],
    },

    async handler(input: unknown, ctx: ToolContext): Promise<ToolResult> {
      const parsed = parseInput(applianceTroubleshootingInput, input);
      if (!parsed.ok) return parsed.result;
      const { appliance_type, issue_description, vehicle_model } = parsed.value;

      ctx.logger.info({ applianceType: appliance_type }, 'Appliance troubleshooting');
      try {
        return success(
          config.applianceGuides.troubleshoot(appliance_type, issue_description, vehicle_model || undefined),
        );
      } catch (error) {
        return errorResult(error, ctx.logger, APPLIANCE_SYSTEM_MESSAGE);
      }
    },
  };

  return [applianceTroubleshooting];
}
