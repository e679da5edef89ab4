/**
 * Playoff Bracket Domain Logic
 *
 * Single source of truth for game winner resolution and cumulative ranking.
 * Used by the real-game engines and by the synthetic-game synthesizer so both
 * break ties the same way.
 *
 * No async I/O, no logging.
 */

/**
 * Minimal game data needed for winner resolution.
 */
export interface MatchupForResolution {
  teamAId: string;
  teamBId: string;
  teamAPoints: number;
  teamBPoints: number;
  teamASeed: number;
  teamBSeed: number;
}

/**
 * Resolve the winner of a single game.
 *
 * Tiebreak order:
 * 1. Points (higher wins)
 * 2. Seed (lower seed number = higher seed wins)
 * 3. Team ID (lower wins)
 */
export function resolveMatchupWinner(matchup: MatchupForResolution): string {
  const { teamAId, teamBId, teamAPoints, teamBPoints, teamASeed, teamBSeed } = matchup;

  if (teamAPoints > teamBPoints) return teamAId;
  if (teamBPoints > teamAPoints) return teamBId;

  // Tie: higher seed (lower seed number) wins
  if (teamASeed < teamBSeed) return teamAId;
  if (teamBSeed < teamASeed) return teamBId;

  return teamAId < teamBId ? teamAId : teamBId;
}

export interface CumulativeEntry {
  teamId: string;
  seed: number;
  totalPoints: number;
}

/**
 * Rank a cohort by points summed across weeks.
 *
 * Tiebreak order:
 * 1. Total points (higher first)
 * 2. Seed (lower seed number first)
 *
 * @returns A new array, best first
 */
export function rankByCumulativePoints<T extends CumulativeEntry>(entries: readonly T[]): T[] {
  return [...entries].sort((a, b) => {
    if (a.totalPoints !== b.totalPoints) return b.totalPoints - a.totalPoints;
    return a.seed - b.seed;
  });
}

/**
 * Fantasy scores carry two decimals; summing floats drifts past that.
 */
export function roundPoints(points: number): number {
  return Math.round(points * 100) / 100;
}
