import { Game } from '../../modules/games/games.model';
import { CohortMember } from '../../modules/playoffs/playoff.model';
import { TeamScoreLookup } from '../../integrations/scoring/team-score-lookup.interface';

export function teamIds(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `t${i + 1}`);
}

export function createGame(
  week: number,
  homeTeamId: string,
  homePoints: number,
  awayTeamId: string,
  awayPoints: number,
  overrides: Partial<Game> = {}
): Game {
  return {
    week,
    homeTeamId,
    homeTeamName: `Team ${homeTeamId}`,
    homePoints,
    awayTeamId,
    awayTeamName: `Team ${awayTeamId}`,
    awayPoints,
    isSynthetic: false,
    syntheticKind: null,
    ...overrides,
  };
}

/**
 * Every pair meets once in `week`; the team listed first always wins 100-90,
 * so seeds come out in the order of `ids`.
 */
export function createRoundRobin(ids: readonly string[], week: number = 1): Game[] {
  const games: Game[] = [];
  for (let i = 0; i < ids.length; i++) {
    for (let j = i + 1; j < ids.length; j++) {
      games.push(createGame(week, ids[i], 100, ids[j], 90));
    }
  }
  return games;
}

export function createMembers(ids: readonly string[], firstSeed: number): CohortMember[] {
  return ids.map((teamId, index) => ({ seed: firstSeed + index, teamId, teamName: `Team ${teamId}` }));
}

/**
 * Score lookup backed by a `teamId@week` table; unknown keys reject.
 */
export function createScoreLookup(scores: Record<string, number>): jest.Mocked<TeamScoreLookup> {
  return {
    getStarterScore: jest.fn(async (teamId: string, _season: number, week: number) => {
      const score = scores[`${teamId}@${week}`];
      if (score === undefined) {
        throw new Error(`no score for ${teamId}@${week}`);
      }
      return score;
    }),
  };
}
