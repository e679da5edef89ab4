import { IPlayoffEngine, AdvanceResult, PlayoffEngineContext } from './playoff-engine.interface';
import {
  BracketNode,
  CohortMember,
  CohortName,
  CohortResult,
  RoundName,
  emptyCohortResult,
  recordPlacement,
} from '../playoff.model';
import { ResolvedNode, resolveBracketNode } from '../bracket-node';
import { gameLabel } from '../../formats/format.model';
import { Game, isBetween } from '../../games/games.model';
import { AppException, ErrorCode, UnresolvedBracketGameError } from '../../../utils/exceptions';
import { logger } from '../../../config/logger.config';

/**
 * Base Playoff Engine
 *
 * Provides shared logic for all cohort engines:
 * - Matching expected pairings to recorded games by team pair
 * - Winner/loser resolution through the domain tie-break
 * - Node and placement bookkeeping
 *
 * Subclasses implement the round structure for their cohort.
 */
export abstract class BasePlayoffEngine implements IPlayoffEngine {
  protected readonly result: CohortResult;

  constructor(
    readonly cohort: CohortName,
    protected readonly ctx: PlayoffEngineContext
  ) {
    this.result = emptyCohortResult(cohort);
  }

  abstract get isComplete(): boolean;

  /**
   * Template method for advancing from a week.
   * Subclasses implement `advanceInternal` for cohort-specific logic.
   */
  advanceFromWeek(week: number): AdvanceResult {
    if (this.isComplete) {
      return {
        advanced: false,
        nodesResolved: 0,
        bracketComplete: true,
        message: `${this.cohort} bracket already resolved`,
      };
    }

    const weekGames = this.ctx.games.filter((game) => game.week === week && !game.isSynthetic);
    const nodesBefore = this.result.nodes.length;
    const advanced = this.advanceInternal(week, weekGames);
    const nodesResolved = this.result.nodes.length - nodesBefore;

    return {
      advanced,
      nodesResolved,
      bracketComplete: this.isComplete,
      message: advanced
        ? `Resolved ${nodesResolved} ${this.cohort} games in week ${week}`
        : `No ${this.cohort} games due in week ${week}`,
    };
  }

  /**
   * Cohort-specific advancement. Returns false when nothing was due this week.
   */
  protected abstract advanceInternal(week: number, weekGames: readonly Game[]): boolean;

  getResult(): CohortResult {
    return this.result;
  }

  /**
   * Find the game between two teams. Matching is by team pair, not by game id
   * or home/away order.
   *
   * @throws UnresolvedBracketGameError when the pairing has no game
   */
  protected findGame(
    weekGames: readonly Game[],
    week: number,
    roundName: RoundName,
    teamA: CohortMember,
    teamB: CohortMember
  ): Game {
    const game = this.findOptionalGame(weekGames, week, roundName, teamA, teamB);
    if (!game) {
      throw new UnresolvedBracketGameError(this.ctx.season, week, roundName, [teamA.teamId, teamB.teamId]);
    }
    return game;
  }

  protected findOptionalGame(
    weekGames: readonly Game[],
    week: number,
    roundName: RoundName,
    teamA: CohortMember,
    teamB: CohortMember
  ): Game | null {
    const matches = weekGames.filter((game) => isBetween(game, teamA.teamId, teamB.teamId));
    if (matches.length > 1) {
      logger.warn(`Season ${this.ctx.season} week ${week}: ${matches.length} games for one ${roundName} pairing`, {
        teams: [teamA.teamId, teamB.teamId],
      });
    }
    return matches[0] ?? null;
  }

  /**
   * Resolve a game into a node, record it and any place it awards.
   */
  protected resolveNode(
    roundName: RoundName,
    game: Game,
    teamA: CohortMember,
    teamB: CohortMember,
    placeAwarded: number | null = null
  ): ResolvedNode {
    const resolved = resolveBracketNode(
      this.cohort,
      roundName,
      gameLabel(this.ctx.format, roundName),
      game,
      teamA,
      teamB,
      placeAwarded
    );
    this.addNode(resolved.node);
    return resolved;
  }

  protected addNode(node: BracketNode): void {
    this.result.nodes.push(node);
    recordPlacement(this.result, node);
  }

  protected memberBySeed(seed: number): CohortMember {
    const member = this.ctx.members.find((candidate) => candidate.seed === seed);
    if (!member) {
      throw new AppException(
        `Season ${this.ctx.season}: seed ${seed} is not in the ${this.cohort} cohort`,
        ErrorCode.INTERNAL_ERROR
      );
    }
    return member;
  }
}
