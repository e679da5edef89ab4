import { BasePlayoffEngine } from './base-playoff.engine';
import { PlayoffEngineContext } from './playoff-engine.interface';
import { CohortMember, CohortName } from '../playoff.model';
import { Game, involvesTeam, opponentOf, pointsFor } from '../../games/games.model';
import { bestSeed } from '../bracket-node';
import { rankByCumulativePoints, roundPoints } from '../../../domain/playoff';
import { UnresolvedBracketGameError } from '../../../utils/exceptions';

/**
 * Cumulative Engine
 *
 * Handles a cohort whose members play each other every playoff week without
 * elimination. Each game is recorded as a node; places come from points
 * summed across all playoff weeks.
 */
export class CumulativeEngine extends BasePlayoffEngine {
  private readonly totals = new Map<string, number>();
  private weeksPlayed = 0;
  private resolved = false;

  constructor(cohort: CohortName, ctx: PlayoffEngineContext) {
    super(cohort, ctx);
    for (const member of ctx.members) {
      this.totals.set(member.teamId, 0);
    }
  }

  get isComplete(): boolean {
    return this.resolved;
  }

  protected advanceInternal(week: number, weekGames: readonly Game[]): boolean {
    const { playoffStartWeek, playoffEndWeek } = this.ctx.format;
    if (week < playoffStartWeek || week > playoffEndWeek) return false;

    const paired = new Set<string>();
    for (const member of this.ctx.members) {
      if (paired.has(member.teamId)) continue;

      const opponent = this.findCohortOpponent(member, week, weekGames, paired);
      const game = this.findGame(weekGames, week, 'mediocre_bowl', member, opponent);
      this.resolveNode('mediocre_bowl', game, member, opponent);

      paired.add(member.teamId);
      paired.add(opponent.teamId);
      this.addPoints(member.teamId, pointsFor(game, member.teamId));
      this.addPoints(opponent.teamId, pointsFor(game, opponent.teamId));
    }

    this.weeksPlayed++;
    if (week === playoffEndWeek) {
      this.rank();
    }
    return true;
  }

  /**
   * Cumulative totals so far, by team id.
   */
  getTotals(): ReadonlyMap<string, number> {
    return this.totals;
  }

  getWeeksPlayed(): number {
    return this.weeksPlayed;
  }

  private findCohortOpponent(
    member: CohortMember,
    week: number,
    weekGames: readonly Game[],
    paired: ReadonlySet<string>
  ): CohortMember {
    for (const game of weekGames) {
      if (!involvesTeam(game, member.teamId)) continue;
      const opponentId = opponentOf(game, member.teamId);
      const opponent = this.ctx.members.find((candidate) => candidate.teamId === opponentId);
      if (opponent && !paired.has(opponent.teamId)) return opponent;
    }

    throw new UnresolvedBracketGameError(
      this.ctx.season,
      week,
      'mediocre_bowl',
      [member.teamId],
      `no game against another ${this.cohort} cohort team`
    );
  }

  private addPoints(teamId: string, points: number): void {
    this.totals.set(teamId, roundPoints((this.totals.get(teamId) ?? 0) + points));
  }

  private rank(): void {
    const firstPlace = bestSeed(this.ctx.members);
    const ranked = rankByCumulativePoints(
      this.ctx.members.map((member) => ({
        teamId: member.teamId,
        seed: member.seed,
        totalPoints: this.totals.get(member.teamId) ?? 0,
      }))
    );
    ranked.forEach((entry, index) => {
      this.result.placements.set(entry.teamId, firstPlace + index);
    });
    this.resolved = true;
  }
}
