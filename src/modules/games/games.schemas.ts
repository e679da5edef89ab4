import { z } from 'zod';
import { SYNTHETIC_KINDS } from './games.model';

const teamIdSchema = z.union([z.string().min(1), z.number().int()]).transform((val) => String(val));
const pointsSchema = z.union([z.number(), z.string().min(1)]).pipe(z.coerce.number().finite());

/**
 * One row of a processed schedule file, as written by the scraper.
 * Ids and numbers may arrive as strings (CSV-derived JSON).
 */
export const rawGameSchema = z.object({
  week: z.union([z.number().int(), z.string().min(1)]).pipe(z.coerce.number().int().positive()),
  home_team_id: teamIdSchema,
  home_team: z.string().default(''),
  home_points: pointsSchema,
  away_team_id: teamIdSchema,
  away_team: z.string().default(''),
  away_points: pointsSchema,
  is_simulated: z.boolean().default(false),
  simulation_type: z
    .enum(SYNTHETIC_KINDS)
    .nullable()
    .default(null),
});

export const scheduleFileSchema = z.array(rawGameSchema);

export type RawGame = z.infer<typeof rawGameSchema>;
