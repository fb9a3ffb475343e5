/**
 * Shape validation for POST /api/optimize.
 *
 * Only structure is checked here. Quantities stay loosely typed so the route
 * service can fall back to derived values instead of rejecting the request.
 */

import { z } from 'zod';

const locationName = z.string().min(1, 'location name must not be empty');

export const missionInputSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform(String).optional(),
    pickup: locationName,
    dropoffs: z.array(locationName).min(1, 'at least one dropoff location is required').optional(),
    dropoff: locationName.optional(),
    cargo_scu: z.unknown().optional(),
    cargo_type: z.string().min(1).optional(),
    dropoff_cargo_types: z.array(z.string().min(1)).nullish(),
    dropoff_cargo_amounts: z.array(z.unknown()).nullish(),
    payout: z.union([z.number(), z.string()]).nullish(),
    description: z.string().optional(),
  })
  .refine((mission) => mission.dropoffs !== undefined || mission.dropoff !== undefined, {
    message: 'missing dropoff location(s)',
    path: ['dropoffs'],
  });

export type MissionInput = z.infer<typeof missionInputSchema>;

/** Id a mission is known by: its own, or M<position> counting from 1 */
export function effectiveMissionId(mission: MissionInput, position: number): string {
  return mission.id ?? `M${position + 1}`;
}

export const optimizeRequestSchema = z
  .object({
    missions: z.array(missionInputSchema).default([]),
    start_location: z.string({ required_error: 'No start location provided' }).min(1, 'No start location provided'),
    ship_id: z.string().min(1).optional(),
  })
  .superRefine((request, ctx) => {
    const seen = new Set<string>();
    request.missions.forEach((mission, position) => {
      const id = effectiveMissionId(mission, position);
      if (seen.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate mission id ${id}`,
          path: ['missions', position, 'id'],
        });
      }
      seen.add(id);
    });
  });

export type OptimizeRequest = z.infer<typeof optimizeRequestSchema>;

/** Flatten zod issues into "path: message" strings */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
