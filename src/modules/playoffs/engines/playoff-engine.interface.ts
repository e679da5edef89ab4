import { Game } from '../../games/games.model';
import { BracketFormat } from '../../formats/format.model';
import { CohortMember, CohortName, CohortResult } from '../playoff.model';

/**
 * Everything an engine needs for one cohort of one season.
 * games holds the season's real playoff-week games; engines filter by week.
 */
export interface PlayoffEngineContext {
  season: number;
  format: BracketFormat;
  members: readonly CohortMember[];
  games: readonly Game[];
}

export interface AdvanceResult {
  advanced: boolean;
  nodesResolved: number;
  bracketComplete: boolean;
  message: string;
}

/**
 * One stateful engine per cohort per season. advanceFromWeek is called once for
 * each playoff week in order; weeks with nothing due are no-ops.
 */
export interface IPlayoffEngine {
  readonly cohort: CohortName;
  readonly isComplete: boolean;
  advanceFromWeek(week: number): AdvanceResult;
  getResult(): CohortResult;
}
