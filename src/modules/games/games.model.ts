/**
 * Game models
 */

/**
 * Why a synthetic game exists. Real games have no kind.
 */
export const SYNTHETIC_KINDS = [
  'toilet_bowl_round_1',
  'toilet_bowl_winners',
  'toilet_bowl_losers',
  'mediocre_bowl',
] as const;

export type SyntheticKind = (typeof SYNTHETIC_KINDS)[number];

/**
 * A single head-to-head result. Immutable once recorded.
 * Real games come from the schedule scraper; synthetic games are built from
 * real per-team weekly scores for cohorts that never met on the schedule.
 */
export interface Game {
  readonly week: number;
  readonly homeTeamId: string;
  readonly homeTeamName: string;
  readonly homePoints: number;
  readonly awayTeamId: string;
  readonly awayTeamName: string;
  readonly awayPoints: number;
  readonly isSynthetic: boolean;
  readonly syntheticKind: SyntheticKind | null;
}

export function involvesTeam(game: Game, teamId: string): boolean {
  return game.homeTeamId === teamId || game.awayTeamId === teamId;
}

/**
 * True when the game is between exactly these two teams, in either order.
 */
export function isBetween(game: Game, teamAId: string, teamBId: string): boolean {
  return (
    (game.homeTeamId === teamAId && game.awayTeamId === teamBId) ||
    (game.homeTeamId === teamBId && game.awayTeamId === teamAId)
  );
}

export function pointsFor(game: Game, teamId: string): number {
  return game.homeTeamId === teamId ? game.homePoints : game.awayPoints;
}

export function opponentOf(game: Game, teamId: string): string {
  return game.homeTeamId === teamId ? game.awayTeamId : game.homeTeamId;
}
