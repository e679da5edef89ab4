import { Game, pointsFor } from '../games/games.model';
import { BracketNode, CohortMember, CohortName, RoundName } from './playoff.model';
import { resolveMatchupWinner } from '../../domain/playoff';

export interface ResolvedNode {
  node: BracketNode;
  winner: CohortMember;
  loser: CohortMember;
}

/**
 * Turn a played (or synthesized) game between two cohort members into a
 * bracket node. Ties go to the better seed.
 */
export function resolveBracketNode(
  cohort: CohortName,
  roundName: RoundName,
  label: string,
  game: Game,
  teamA: CohortMember,
  teamB: CohortMember,
  placeAwarded: number | null
): ResolvedNode {
  const winnerId = resolveMatchupWinner({
    teamAId: teamA.teamId,
    teamBId: teamB.teamId,
    teamAPoints: pointsFor(game, teamA.teamId),
    teamBPoints: pointsFor(game, teamB.teamId),
    teamASeed: teamA.seed,
    teamBSeed: teamB.seed,
  });
  const [winner, loser] = winnerId === teamA.teamId ? [teamA, teamB] : [teamB, teamA];

  return {
    node: {
      cohort,
      roundName,
      label,
      week: game.week,
      game,
      winnerId: winner.teamId,
      loserId: loser.teamId,
      placeAwarded,
    },
    winner,
    loser,
  };
}

/**
 * Lowest seed in a group of members: the first place the group can award.
 */
export function bestSeed(members: readonly CohortMember[]): number {
  return Math.min(...members.map((member) => member.seed));
}
