import { FormatCatalog } from '../formats/format-catalog';
import { CohortOverrideTable } from '../formats/cohort-overrides';
import { BracketFormat } from '../formats/format.model';
import { Game } from '../games/games.model';
import { GameRepository } from '../games/games.repository';
import { StandingsCalculator } from '../standings/standings.calculator';
import { Standing, TeamRecord } from '../standings/standings.model';
import { CohortClassifier } from './cohort.classifier';
import { BracketProgressor } from './engines';
import { SyntheticGameSynthesizer } from './synthetic-game.synthesizer';
import { StandingsAssembler } from './standings.assembler';
import { BracketNode, SeasonCohorts } from './playoff.model';
import { MissingDataError } from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

/**
 * Everything derived for one season, for callers that persist more than the
 * final standings.
 */
export interface SeasonResolution {
  season: number;
  format: BracketFormat;
  records: TeamRecord[];
  cohorts: SeasonCohorts;
  nodes: BracketNode[];
  syntheticGames: Game[];
  standings: Standing[];
}

export type SeasonOutcome =
  | { season: number; status: 'resolved'; standings: Standing[] }
  | { season: number; status: 'failed'; error: Error };

export class SeasonResolutionService {
  constructor(
    private readonly formatCatalog: FormatCatalog,
    private readonly cohortOverrides: CohortOverrideTable,
    private readonly gameRepo: GameRepository,
    private readonly standingsCalculator: StandingsCalculator,
    private readonly cohortClassifier: CohortClassifier,
    private readonly bracketProgressor: BracketProgressor,
    private readonly synthesizer: SyntheticGameSynthesizer,
    private readonly standingsAssembler: StandingsAssembler,
    private readonly seasonConcurrency: number = 4
  ) {}

  /**
   * Final standings for a season, places 1..N.
   * Either the full list is returned or a typed error is thrown.
   */
  async resolveSeason(season: number): Promise<Standing[]> {
    const resolution = await this.resolveSeasonDetailed(season);
    return resolution.standings;
  }

  async resolveSeasonDetailed(season: number): Promise<SeasonResolution> {
    const startedAt = Date.now();
    const format = this.formatCatalog.getFormat(season);
    logger.info(`Resolving season ${season}`, { format: format.name });

    const games = await this.gameRepo.getGames(season);
    const records = this.standingsCalculator.calculate(season, games, format.regularSeasonWeeks);
    const cohorts = this.cohortClassifier.classify(records, format, this.cohortOverrides.get(season));

    const playoffGames = games.filter(
      (game) => !game.isSynthetic && game.week >= format.playoffStartWeek && game.week <= format.playoffEndWeek
    );
    if (playoffGames.length === 0) {
      throw new MissingDataError(season, format.playoffStartWeek, format.playoffEndWeek);
    }

    const bracketResults = this.bracketProgressor.progress(season, format, cohorts, playoffGames);
    const syntheticResults = await this.synthesizer.synthesizeForSeason(season, format, cohorts);
    const results = [...bracketResults, ...syntheticResults];
    const standings = this.standingsAssembler.assemble(season, format, cohorts, results);

    logger.info(`Resolved season ${season}`, {
      teams: standings.length,
      champion: standings[0]?.teamId,
      durationMs: Date.now() - startedAt,
    });

    return {
      season,
      format,
      records,
      cohorts,
      nodes: results.flatMap((result) => result.nodes),
      syntheticGames: results.flatMap((result) => result.syntheticGames),
      standings,
    };
  }

  /**
   * Resolve several seasons independently, at most seasonConcurrency at a time.
   * Outcomes come back in input order; one failed season never affects another.
   */
  async resolveSeasons(seasons: readonly number[]): Promise<SeasonOutcome[]> {
    const outcomes: SeasonOutcome[] = new Array(seasons.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < seasons.length) {
        const index = next++;
        outcomes[index] = await this.resolveOutcome(seasons[index]);
      }
    };

    const workerCount = Math.min(Math.max(this.seasonConcurrency, 1), seasons.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return outcomes;
  }

  private async resolveOutcome(season: number): Promise<SeasonOutcome> {
    try {
      return { season, status: 'resolved', standings: await this.resolveSeason(season) };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logger.error(`Failed to resolve season ${season}: ${cause.message}`, { errorName: cause.name });
      return { season, status: 'failed', error: cause };
    }
  }
}
