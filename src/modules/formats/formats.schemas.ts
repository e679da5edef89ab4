import { z } from 'zod';
import { DEFAULT_GAME_LABELS, ROUND_NAMES } from '../playoffs/playoff.model';
import { BracketFormat, championshipRounds } from './format.model';
import { computeByeSeeds } from '../../domain/playoff';

const seedSchema = z.number().int().positive();
const seedPairSchema = z.tuple([seedSchema, seedSchema]);
const roundNameSchema = z.enum(ROUND_NAMES);
const cohortModeSchema = z.enum(['head_to_head', 'synthetic']);

const seasonRangeSchema = z
  .object({
    from: z.number().int(),
    to: z.number().int().nullable().default(null),
  })
  .refine((range) => range.to === null || range.to >= range.from, {
    message: 'Season range must not end before it starts',
  });

const placementGroupSchema = z.object({
  pairings: z.array(seedPairSchema).length(2),
  topGame: roundNameSchema,
  bottomGame: roundNameSchema,
});

function seedRange(from: number, to: number): number[] {
  const seeds: number[] = [];
  for (let seed = from; seed <= to; seed++) seeds.push(seed);
  return seeds;
}

function sameSeeds(actual: number[], expected: number[]): boolean {
  const sorted = [...actual].sort((a, b) => a - b);
  return sorted.length === expected.length && sorted.every((seed, i) => seed === expected[i]);
}

export const bracketFormatSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(''),
    seasons: z.array(seasonRangeSchema).min(1),
    totalTeams: z.number().int().positive(),
    regularSeasonWeeks: z.number().int().positive(),
    playoffStartWeek: z.number().int().positive(),
    playoffEndWeek: z.number().int().positive(),
    championshipSize: z.union([z.literal(4), z.literal(6)]),
    middleSize: z.number().int().nonnegative(),
    consolationSize: z.number().int().nonnegative(),
    hasByes: z.boolean(),
    hasMiddleCohort: z.boolean(),
    middleMode: cohortModeSchema.nullable().default(null),
    consolationMode: cohortModeSchema,
    firstRoundPairings: z.array(seedPairSchema).length(2),
    consolationGroups: z.array(placementGroupSchema).default([]),
    gameLabels: z.record(roundNameSchema, z.string().min(1)).default({}),
  })
  .superRefine((format, ctx) => {
    const issue = (message: string, path: (string | number)[] = []) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, message, path });

    if (format.championshipSize + format.middleSize + format.consolationSize !== format.totalTeams) {
      issue('championshipSize + middleSize + consolationSize must equal totalTeams');
    }
    if (format.playoffStartWeek <= format.regularSeasonWeeks) {
      issue('playoffStartWeek must come after the regular season', ['playoffStartWeek']);
    }
    if (format.playoffEndWeek < format.playoffStartWeek) {
      issue('playoffEndWeek must not precede playoffStartWeek', ['playoffEndWeek']);
    }

    // Six-team cohorts are the only ones with byes
    if (format.hasByes !== (format.championshipSize === 6)) {
      issue('hasByes must be true exactly when championshipSize is 6', ['hasByes']);
    }
    const weekCount = format.playoffEndWeek - format.playoffStartWeek + 1;
    const rounds = championshipRounds(format.hasByes).length;
    if (weekCount !== rounds) {
      issue(`Championship bracket needs ${rounds} playoff weeks, format has ${weekCount}`, ['playoffEndWeek']);
    }

    const byeSeeds = computeByeSeeds(format.championshipSize);
    const roundOneSeeds = seedRange(1, format.championshipSize).filter((seed) => !byeSeeds.includes(seed));
    if (!sameSeeds(format.firstRoundPairings.flat(), roundOneSeeds)) {
      issue(`firstRoundPairings must pair seeds ${roundOneSeeds.join(', ')} exactly once`, ['firstRoundPairings']);
    }

    if (format.hasMiddleCohort !== format.middleSize > 0) {
      issue('hasMiddleCohort must be true exactly when middleSize > 0', ['hasMiddleCohort']);
    }
    if (format.hasMiddleCohort !== (format.middleMode !== null)) {
      issue('middleMode is required with a middle cohort and forbidden without one', ['middleMode']);
    }
    if (format.middleMode === 'synthetic' && format.middleSize % 2 !== 0) {
      issue('A synthetic middle cohort needs an even number of teams', ['middleSize']);
    }

    const firstConsolationSeed = format.championshipSize + format.middleSize + 1;
    const consolationSeeds = seedRange(firstConsolationSeed, format.totalTeams);
    const groupSeeds = format.consolationGroups.flatMap((group) => group.pairings.flat());
    if (!sameSeeds(groupSeeds, consolationSeeds)) {
      issue(`consolationGroups must cover seeds ${consolationSeeds.join(', ')} exactly once`, ['consolationGroups']);
    }

    if (format.consolationMode === 'synthetic') {
      if (format.consolationGroups.length !== 1 || format.consolationSize !== 4) {
        issue('A synthetic consolation cohort is a single group of four teams', ['consolationGroups']);
      } else {
        const [group] = format.consolationGroups;
        const seeds = [...group.pairings.flat()].sort((a, b) => a - b);
        const [first, second] = group.pairings;
        const topVsBottom =
          sameSeeds([...first], [seeds[0], seeds[3]]) && sameSeeds([...second], [seeds[1], seeds[2]]);
        if (!topVsBottom) {
          issue('Synthetic consolation pairings must be top seed vs bottom seed, then second vs third', [
            'consolationGroups',
          ]);
        }
      }
    }
  });

export const formatCatalogFileSchema = z.object({
  formats: z.array(bracketFormatSchema).min(1),
});

export type BracketFormatEntry = z.infer<typeof bracketFormatSchema>;

export function formatFromEntry(entry: BracketFormatEntry): BracketFormat {
  return {
    name: entry.name,
    description: entry.description,
    seasons: entry.seasons.map((range) => ({ from: range.from, to: range.to })),
    totalTeams: entry.totalTeams,
    regularSeasonWeeks: entry.regularSeasonWeeks,
    playoffStartWeek: entry.playoffStartWeek,
    playoffEndWeek: entry.playoffEndWeek,
    championshipSize: entry.championshipSize,
    middleSize: entry.middleSize,
    consolationSize: entry.consolationSize,
    hasByes: entry.hasByes,
    hasMiddleCohort: entry.hasMiddleCohort,
    middleMode: entry.middleMode,
    consolationMode: entry.consolationMode,
    firstRoundPairings: entry.firstRoundPairings,
    consolationGroups: entry.consolationGroups,
    gameLabels: { ...DEFAULT_GAME_LABELS, ...entry.gameLabels },
  };
}

/**
 * Divisional seeding overrides: ordered team ids per cohort, best seed first.
 * consolation may be omitted, in which case the remaining teams fill it in
 * standings order.
 */
export const cohortOverrideSchema = z.object({
  championship: z.array(z.string().min(1)),
  middle: z.array(z.string().min(1)).default([]),
  consolation: z.array(z.string().min(1)).optional(),
});

export const cohortOverrideFileSchema = z.record(
  z.string().regex(/^\d{4}$/, 'Override keys must be four-digit seasons'),
  cohortOverrideSchema
);

export type CohortOverride = z.infer<typeof cohortOverrideSchema>;
