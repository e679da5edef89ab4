import { IPlayoffEngine, PlayoffEngineContext } from './playoff-engine.interface';
import { ChampionshipEngine } from './championship.engine';
import { PlacementGroupEngine } from './placement-group.engine';
import { CumulativeEngine } from './cumulative.engine';
import { BracketFormat } from '../../formats/format.model';
import { Game } from '../../games/games.model';
import { SeasonCohorts } from '../playoff.model';

/**
 * Factory for creating the engines of one season.
 *
 * Usage:
 *   const factory = new PlayoffEngineFactory();
 *   const engines = factory.createForSeason(season, format, cohorts, games);
 *   engines.forEach((engine) => engine.advanceFromWeek(week));
 *
 * Cohorts in synthetic mode get no engine: they have no recorded games to walk.
 */
export class PlayoffEngineFactory {
  createForSeason(
    season: number,
    format: BracketFormat,
    cohorts: SeasonCohorts,
    games: readonly Game[]
  ): IPlayoffEngine[] {
    const context = (members: SeasonCohorts[keyof SeasonCohorts]): PlayoffEngineContext => ({
      season,
      format,
      members,
      games,
    });

    const engines: IPlayoffEngine[] = [new ChampionshipEngine(context(cohorts.championship))];

    if (format.hasMiddleCohort && format.middleMode === 'head_to_head') {
      engines.push(new CumulativeEngine('middle', context(cohorts.middle)));
    }

    if (format.consolationMode === 'head_to_head') {
      engines.push(new PlacementGroupEngine('consolation', context(cohorts.consolation), format.consolationGroups));
    }

    return engines;
  }
}
