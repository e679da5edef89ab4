import { BasePlayoffEngine } from './base-playoff.engine';
import { PlayoffEngineContext } from './playoff-engine.interface';
import { CohortMember, CohortName, PlacementGroupState } from '../playoff.model';
import { PlacementGroup } from '../../formats/format.model';
import { Game } from '../../games/games.model';
import { bestSeed } from '../bracket-node';

interface GroupProgress {
  group: PlacementGroup;
  firstPlace: number;
  winners: CohortMember[];
  losers: CohortMember[];
}

/**
 * Placement Group Engine
 *
 * Handles a cohort that plays real head-to-head placement games in groups of
 * four: two first-round games in the start week, then the winners meet for
 * the group's top place and the losers for its bottom places in the end week.
 */
export class PlacementGroupEngine extends BasePlayoffEngine {
  private state: PlacementGroupState = 'SEEDED';
  private readonly groups: GroupProgress[];

  constructor(cohort: CohortName, ctx: PlayoffEngineContext, groups: readonly PlacementGroup[]) {
    super(cohort, ctx);
    this.groups = groups.map((group) => ({
      group,
      firstPlace: bestSeed(group.pairings.flat().map((seed) => this.memberBySeed(seed))),
      winners: [],
      losers: [],
    }));
  }

  get isComplete(): boolean {
    return this.state === 'RESOLVED';
  }

  protected advanceInternal(week: number, weekGames: readonly Game[]): boolean {
    if (this.state === 'SEEDED' && week === this.ctx.format.playoffStartWeek) {
      for (const progress of this.groups) {
        this.playFirstRound(progress, week, weekGames);
      }
      this.state = 'ROUND1_COMPLETE';
      return true;
    }

    if (this.state === 'ROUND1_COMPLETE' && week === this.ctx.format.playoffEndWeek) {
      for (const progress of this.groups) {
        this.playPlacementGames(progress, week, weekGames);
      }
      this.state = 'RESOLVED';
      return true;
    }

    return false;
  }

  private playFirstRound(progress: GroupProgress, week: number, weekGames: readonly Game[]): void {
    for (const [seedA, seedB] of progress.group.pairings) {
      const teamA = this.memberBySeed(seedA);
      const teamB = this.memberBySeed(seedB);
      const game = this.findGame(weekGames, week, 'round_1', teamA, teamB);
      const { winner, loser } = this.resolveNode('round_1', game, teamA, teamB);
      progress.winners.push(winner);
      progress.losers.push(loser);
    }
  }

  private playPlacementGames(progress: GroupProgress, week: number, weekGames: readonly Game[]): void {
    const { group, firstPlace } = progress;

    const [topA, topB] = progress.winners;
    const topGame = this.findGame(weekGames, week, group.topGame, topA, topB);
    this.resolveNode(group.topGame, topGame, topA, topB, firstPlace);

    const [bottomA, bottomB] = progress.losers;
    const bottomGame = this.findGame(weekGames, week, group.bottomGame, bottomA, bottomB);
    this.resolveNode(group.bottomGame, bottomGame, bottomA, bottomB, firstPlace + 2);
  }
}
