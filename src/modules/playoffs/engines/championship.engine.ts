import { BasePlayoffEngine } from './base-playoff.engine';
import { PlayoffEngineContext } from './playoff-engine.interface';
import { ChampionshipState, CohortMember } from '../playoff.model';
import { Game, isBetween } from '../../games/games.model';
import { computeByeSeeds } from '../../../domain/playoff';
import { UnresolvedBracketGameError } from '../../../utils/exceptions';
import { logger } from '../../../config/logger.config';

/**
 * Championship Engine
 *
 * Handles the championship cohort, with or without byes.
 *
 * Flow without byes (4 teams):
 * 1. Semifinal from firstRoundPairings (start week)
 * 2. Championship game and third-place game (end week)
 *
 * Flow with byes (6 teams):
 * 1. Round 1 among seeds 3-6 (start week)
 * 2. Semifinal: each bye seed against a round-1 winner (next week)
 * 3. Championship, third-place and fifth-place games (end week)
 */
export class ChampionshipEngine extends BasePlayoffEngine {
  private state: ChampionshipState = 'SEEDED';
  private roundOneWinners: CohortMember[] = [];
  private roundOneLosers: CohortMember[] = [];
  private semifinalWinners: CohortMember[] = [];
  private semifinalLosers: CohortMember[] = [];

  constructor(ctx: PlayoffEngineContext) {
    super('championship', ctx);
  }

  get isComplete(): boolean {
    return this.state === 'RESOLVED';
  }

  get currentState(): ChampionshipState {
    return this.state;
  }

  protected advanceInternal(week: number, weekGames: readonly Game[]): boolean {
    if (week !== this.dueWeek()) return false;

    switch (this.state) {
      case 'SEEDED':
        if (this.ctx.format.hasByes) {
          this.playRoundOne(week, weekGames);
        } else {
          this.playOpeningSemifinals(week, weekGames);
        }
        return true;
      case 'ROUND1_COMPLETE':
        this.playByeSemifinals(week, weekGames);
        return true;
      case 'SEMIFINAL_COMPLETE':
        this.playFinalWeek(week, weekGames);
        return true;
      default:
        return false;
    }
  }

  private dueWeek(): number {
    const start = this.ctx.format.playoffStartWeek;
    switch (this.state) {
      case 'SEEDED':
        return start;
      case 'ROUND1_COMPLETE':
        return start + 1;
      default:
        return this.ctx.format.playoffEndWeek;
    }
  }

  private playRoundOne(week: number, weekGames: readonly Game[]): void {
    for (const [seedA, seedB] of this.ctx.format.firstRoundPairings) {
      const teamA = this.memberBySeed(seedA);
      const teamB = this.memberBySeed(seedB);
      const game = this.findGame(weekGames, week, 'round_1', teamA, teamB);
      const { winner, loser } = this.resolveNode('round_1', game, teamA, teamB);
      this.roundOneWinners.push(winner);
      this.roundOneLosers.push(loser);
    }
    this.state = 'ROUND1_COMPLETE';
  }

  private playOpeningSemifinals(week: number, weekGames: readonly Game[]): void {
    for (const [seedA, seedB] of this.ctx.format.firstRoundPairings) {
      this.playSemifinal(week, weekGames, this.memberBySeed(seedA), this.memberBySeed(seedB));
    }
    this.state = 'SEMIFINAL_COMPLETE';
  }

  /**
   * Which round-1 winner each bye seed meets is read from the schedule, not
   * assumed from seeds: leagues differ on reseeding.
   */
  private playByeSemifinals(week: number, weekGames: readonly Game[]): void {
    const remaining = [...this.roundOneWinners];
    for (const seed of computeByeSeeds(this.ctx.format.championshipSize)) {
      const byeTeam = this.memberBySeed(seed);
      const index = remaining.findIndex((winner) =>
        weekGames.some((game) => isBetween(game, byeTeam.teamId, winner.teamId))
      );
      if (index === -1) {
        throw new UnresolvedBracketGameError(
          this.ctx.season,
          week,
          'semifinal',
          [byeTeam.teamId, ...remaining.map((winner) => winner.teamId)],
          `seed ${seed} must meet a first-round winner`
        );
      }
      const [opponent] = remaining.splice(index, 1);
      this.playSemifinal(week, weekGames, byeTeam, opponent);
    }
    this.state = 'SEMIFINAL_COMPLETE';
  }

  private playSemifinal(week: number, weekGames: readonly Game[], teamA: CohortMember, teamB: CohortMember): void {
    const game = this.findGame(weekGames, week, 'semifinal', teamA, teamB);
    const { winner, loser } = this.resolveNode('semifinal', game, teamA, teamB);
    this.semifinalWinners.push(winner);
    this.semifinalLosers.push(loser);
  }

  private playFinalWeek(week: number, weekGames: readonly Game[]): void {
    const [finalistA, finalistB] = this.semifinalWinners;
    const championship = this.findGame(weekGames, week, 'championship', finalistA, finalistB);
    this.resolveNode('championship', championship, finalistA, finalistB, 1);

    const [thirdA, thirdB] = this.semifinalLosers;
    const thirdPlace = this.findGame(weekGames, week, 'third_place', thirdA, thirdB);
    this.resolveNode('third_place', thirdPlace, thirdA, thirdB, 3);

    if (this.ctx.format.hasByes) {
      const [fifthA, fifthB] = this.roundOneLosers;
      const fifthPlace = this.findOptionalGame(weekGames, week, 'fifth_place', fifthA, fifthB);
      if (fifthPlace) {
        this.resolveNode('fifth_place', fifthPlace, fifthA, fifthB, 5);
      } else {
        logger.warn(
          `Season ${this.ctx.season} week ${week}: no fifth place game, ` +
            'round-1 losers fall back to seed order',
          { teams: [fifthA.teamId, fifthB.teamId] }
        );
      }
    }

    this.state = 'RESOLVED';
  }
}
