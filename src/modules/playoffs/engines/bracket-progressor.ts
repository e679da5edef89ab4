import { PlayoffEngineFactory } from './playoff-engine.factory';
import { BracketFormat, playoffWeeks } from '../../formats/format.model';
import { Game } from '../../games/games.model';
import { CohortResult, SeasonCohorts } from '../playoff.model';
import { AppException, ErrorCode } from '../../../utils/exceptions';
import { logger } from '../../../config/logger.config';

/**
 * Walks every playoff week through the season's cohort engines, in week order.
 * Any missing expected game aborts the season.
 */
export class BracketProgressor {
  constructor(private readonly engineFactory: PlayoffEngineFactory) {}

  progress(season: number, format: BracketFormat, cohorts: SeasonCohorts, games: readonly Game[]): CohortResult[] {
    const engines = this.engineFactory.createForSeason(season, format, cohorts, games);

    for (const week of playoffWeeks(format)) {
      for (const engine of engines) {
        const result = engine.advanceFromWeek(week);
        if (result.advanced) {
          logger.debug(`Season ${season}: ${result.message}`);
        }
      }
    }

    const incomplete = engines.filter((engine) => !engine.isComplete).map((engine) => engine.cohort);
    if (incomplete.length > 0) {
      throw new AppException(
        `Season ${season}: ${incomplete.join(', ')} bracket did not finish by week ${format.playoffEndWeek}`,
        ErrorCode.INTERNAL_ERROR
      );
    }

    return engines.map((engine) => engine.getResult());
  }
}
