/**
 * Bracket format descriptor
 *
 * One immutable descriptor per league era. Everything that varies between
 * seasons (cohort sizes, byes, week ranges, pairings, labels) lives here so
 * the engines never branch on the season number.
 */
import { RoundName } from '../playoffs/playoff.model';

export type CohortMode = 'head_to_head' | 'synthetic';

export type SeedPair = readonly [number, number];

/**
 * Four teams: two first-round games, then the winners meet for topGame and
 * the losers for bottomGame.
 */
export interface PlacementGroup {
  pairings: readonly SeedPair[];
  topGame: RoundName;
  bottomGame: RoundName;
}

/** Inclusive; `to: null` is open-ended. */
export interface SeasonRange {
  from: number;
  to: number | null;
}

export interface BracketFormat {
  name: string;
  description: string;
  seasons: readonly SeasonRange[];
  totalTeams: number;
  regularSeasonWeeks: number;
  playoffStartWeek: number;
  playoffEndWeek: number;
  championshipSize: number;
  middleSize: number;
  consolationSize: number;
  hasByes: boolean;
  hasMiddleCohort: boolean;
  middleMode: CohortMode | null;
  consolationMode: CohortMode;
  firstRoundPairings: readonly SeedPair[];
  consolationGroups: readonly PlacementGroup[];
  gameLabels: Readonly<Record<RoundName, string>>;
}

export function coversSeason(range: SeasonRange, season: number): boolean {
  return season >= range.from && (range.to === null || season <= range.to);
}

export function playoffWeeks(format: BracketFormat): number[] {
  const weeks: number[] = [];
  for (let week = format.playoffStartWeek; week <= format.playoffEndWeek; week++) {
    weeks.push(week);
  }
  return weeks;
}

/**
 * Championship rounds in play order: byes add a round before the semifinal.
 */
export function championshipRounds(hasByes: boolean): RoundName[] {
  return hasByes ? ['round_1', 'semifinal', 'championship'] : ['semifinal', 'championship'];
}

export function gameLabel(format: BracketFormat, roundName: RoundName): string {
  return format.gameLabels[roundName];
}

export function formatSeasonRanges(format: BracketFormat): string {
  return format.seasons
    .map((range) => {
      if (range.to === null) return `${range.from}+`;
      return range.from === range.to ? `${range.from}` : `${range.from}-${range.to}`;
    })
    .join(', ');
}
