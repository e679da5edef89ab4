import './bootstrap';
import { container, KEYS } from './container';
import { SeasonOutcome, SeasonResolution, SeasonResolutionService } from './modules/playoffs/season-resolution.service';
import { Standing } from './modules/standings/standings.model';

export function getSeasonResolutionService(): SeasonResolutionService {
  return container.resolve<SeasonResolutionService>(KEYS.SEASON_RESOLUTION_SERVICE);
}

/**
 * Final standings for one season, using the configured data directory,
 * catalog and score client.
 */
export function resolveSeason(season: number): Promise<Standing[]> {
  return getSeasonResolutionService().resolveSeason(season);
}

export function resolveSeasonDetailed(season: number): Promise<SeasonResolution> {
  return getSeasonResolutionService().resolveSeasonDetailed(season);
}

export function resolveSeasons(seasons: readonly number[]): Promise<SeasonOutcome[]> {
  return getSeasonResolutionService().resolveSeasons(seasons);
}

export { container, KEYS } from './container';
export { SeasonResolutionService } from './modules/playoffs/season-resolution.service';
export type { SeasonOutcome, SeasonResolution } from './modules/playoffs/season-resolution.service';
export { FormatCatalog } from './modules/formats/format-catalog';
export { CohortOverrideTable } from './modules/formats/cohort-overrides';
export type { BracketFormat, CohortMode, PlacementGroup, SeasonRange } from './modules/formats/format.model';
export type { CohortOverride } from './modules/formats/formats.schemas';
export { JsonGameRepository, InMemoryGameRepository } from './modules/games/games.repository';
export type { GameRepository } from './modules/games/games.repository';
export type { Game, SyntheticKind } from './modules/games/games.model';
export { StandingsCalculator } from './modules/standings/standings.calculator';
export { standingToResponse } from './modules/standings/standings.model';
export type { Standing, TeamRecord } from './modules/standings/standings.model';
export { CohortClassifier } from './modules/playoffs/cohort.classifier';
export { PlayoffEngineFactory, BracketProgressor } from './modules/playoffs/engines';
export { SyntheticGameSynthesizer } from './modules/playoffs/synthetic-game.synthesizer';
export { StandingsAssembler } from './modules/playoffs/standings.assembler';
export type {
  BracketNode,
  CohortMember,
  CohortName,
  CohortResult,
  RoundName,
  SeasonCohorts,
} from './modules/playoffs/playoff.model';
export { RateLimiter } from './integrations/scoring/rate-limiter';
export { HttpTeamScoreClient } from './integrations/scoring/http-team-score-client';
export type { TeamScoreLookup } from './integrations/scoring/team-score-lookup.interface';
export * from './utils/exceptions';
