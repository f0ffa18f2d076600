import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { InvalidApplianceTypeError } from './errors.js';

const guidesSchema = z.array(
  z.object({
    appliance: z.string().min(1),
    issues: z
      .array(
        z.object({
          issue: z.string().min(1),
          steps: z.array(z.string().min(1)).min(1),
        }),
      )
      .min(1),
  }),
);

export type ApplianceGuide = z.infer<typeof guidesSchema>[number];

export interface Troubleshooting {
  appliance: string;
  issue: string;
  troubleshooting_steps: string[];
  model_specific_info: string | null;
}

/**
 * Troubleshooting steps per appliance, each appliance with an ordered list
 * of known issues. The first issue is the fallback when a description
 * names none of them.
 */
export class ApplianceGuides {
  private readonly guides: ReadonlyMap<string, ApplianceGuide>;

  constructor(guides: readonly ApplianceGuide[]) {
    this.guides = new Map<string, ApplianceGuide>(guides.filter((g) => g.issues.length > 0).map((g) => [g.appliance, g]));
  }

  appliances(): string[] {
    return [...this.guides.keys()];
  }

  /**
   * Pick the steps for an issue description. Matching is a case-insensitive
   * substring test of each issue key, in table order.
   *
   * @throws InvalidApplianceTypeError for an appliance not in the table
   */
  troubleshoot(applianceType: string, issueDescription: string, vehicleModel?: string): Troubleshooting {
    const appliance = applianceType.toLowerCase();
    const guide = this.guides.get(appliance);
    if (!guide) {
      throw new InvalidApplianceTypeError(appliance, this.appliances());
    }

    const description = issueDescription.toLowerCase();
    const [first] = guide.issues;
    const match = guide.issues.find((i) => description.includes(i.issue)) ?? first;
    if (!match) {
      throw new InvalidApplianceTypeError(appliance, this.appliances());
    }

    return {
      appliance,
      issue: match.issue,
      troubleshooting_steps: [...match.steps],
      model_specific_info: vehicleModel
        ? `These steps are general guidelines for all campervans. Your ${vehicleModel} may have specific features - please refer to the vehicle manual for detailed instructions.`
        : null,
    };
  }
}

export function parseApplianceGuides(data: unknown): ApplianceGuide[] {
  return guidesSchema.parse(data);
}

let defaultGuides: ApplianceGuides | undefined;

/**
 * The built-in campervan guides, loaded once from `data/appliance-guides.json`.
 */
export function defaultApplianceGuides(): ApplianceGuides {
  if (!defaultGuides) {
    const raw = readFileSync(new URL('../data/appliance-guides.json', import.meta.url), 'utf-8');
    defaultGuides = new ApplianceGuides(parseApplianceGuides(JSON.parse(raw)));
  }
  return defaultGuides;
}
