/**
 * Regular-Season Seeding Domain Logic
 *
 * Pure functions for records, win percentage and seed order.
 * No async I/O, no logging.
 */

/**
 * Minimal record data needed for seeding.
 * Domain does not import from modules; callers map from their record type.
 */
export interface StandingForSeeding {
  wins: number;
  losses: number;
  ties: number;
  pointsFor: number;
}

export function gamesPlayed(record: StandingForSeeding): number {
  return record.wins + record.losses + record.ties;
}

/**
 * (wins + 0.5 * ties) / games played, or 0 before any game.
 */
export function winPercentage(record: StandingForSeeding): number {
  const played = gamesPlayed(record);
  if (played === 0) return 0;
  return (record.wins + 0.5 * record.ties) / played;
}

/**
 * Order: Win% DESC > Points For DESC.
 *
 * There is no third tie-break. Teams level on both keep their input order
 * (Array.prototype.sort is stable), which callers must treat as arbitrary.
 *
 * @returns A new sorted array; the input is not mutated
 */
export function sortStandingsForSeeding<T extends StandingForSeeding>(standings: readonly T[]): T[] {
  return [...standings].sort((a, b) => {
    const pctDiff = winPercentage(b) - winPercentage(a);
    if (pctDiff !== 0) return pctDiff;
    return b.pointsFor - a.pointsFor;
  });
}

/**
 * Seeds that skip round 1. Six-team championship cohorts give seeds 1 and 2
 * a bye; four-team cohorts play everyone in round 1.
 */
export function computeByeSeeds(championshipSize: number): number[] {
  return championshipSize === 6 ? [1, 2] : [];
}
