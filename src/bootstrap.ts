// Ensure env is loaded before accessing process.env
import { env } from './config/env.config';

import { container, KEYS } from './container';

// Configuration
import { FormatCatalog, DEFAULT_FORMAT_CATALOG_PATH } from './modules/formats/format-catalog';
import { CohortOverrideTable, DEFAULT_COHORT_OVERRIDES_PATH } from './modules/formats/cohort-overrides';

// Repositories
import { JsonGameRepository } from './modules/games/games.repository';

// Engines
import { PlayoffEngineFactory, BracketProgressor } from './modules/playoffs/engines';

// Services
import { StandingsCalculator } from './modules/standings/standings.calculator';
import { CohortClassifier } from './modules/playoffs/cohort.classifier';
import { SyntheticGameSynthesizer } from './modules/playoffs/synthetic-game.synthesizer';
import { StandingsAssembler } from './modules/playoffs/standings.assembler';
import { SeasonResolutionService } from './modules/playoffs/season-resolution.service';

// External Clients
import { RateLimiter } from './integrations/scoring/rate-limiter';
import { HttpTeamScoreClient } from './integrations/scoring/http-team-score-client';
import { TeamScoreLookup } from './integrations/scoring/team-score-lookup.interface';

export function bootstrap(): void {
  // Configuration
  container.register(KEYS.FORMAT_CATALOG, () =>
    FormatCatalog.fromFile(env.FORMAT_CATALOG_PATH ?? DEFAULT_FORMAT_CATALOG_PATH)
  );
  container.register(KEYS.COHORT_OVERRIDES, () =>
    CohortOverrideTable.fromFile(env.COHORT_OVERRIDES_PATH ?? DEFAULT_COHORT_OVERRIDES_PATH)
  );

  // Repositories
  container.register(KEYS.GAME_REPO, () => new JsonGameRepository(env.DATA_DIR));

  // External Clients
  container.register(
    KEYS.SCORE_RATE_LIMITER,
    () =>
      new RateLimiter({
        maxConcurrent: env.SCORE_MAX_CONCURRENCY,
        requestsPerMinute: env.SCORE_REQUESTS_PER_MINUTE,
        minDelayMs: env.SCORE_MIN_DELAY_MS,
        jitterFactor: env.SCORE_JITTER_FACTOR,
      })
  );

  // Score client - only register if the score service is configured
  container.register<TeamScoreLookup | null>(KEYS.TEAM_SCORE_CLIENT, () => {
    if (env.SCORE_API_BASE_URL && env.SCORE_API_LEAGUE_ID) {
      return new HttpTeamScoreClient(
        {
          baseUrl: env.SCORE_API_BASE_URL,
          leagueId: env.SCORE_API_LEAGUE_ID,
          timeoutMs: env.SCORE_TIMEOUT_MS,
          maxRetries: env.SCORE_MAX_RETRIES,
          retryBaseDelayMs: env.SCORE_RETRY_BASE_DELAY_MS,
          jitterFactor: env.SCORE_JITTER_FACTOR,
        },
        container.resolve(KEYS.SCORE_RATE_LIMITER)
      );
    }
    return null;
  });

  // Engines
  container.register(KEYS.PLAYOFF_ENGINE_FACTORY, () => new PlayoffEngineFactory());
  container.register(
    KEYS.BRACKET_PROGRESSOR,
    () => new BracketProgressor(container.resolve(KEYS.PLAYOFF_ENGINE_FACTORY))
  );

  // Services
  container.register(KEYS.STANDINGS_CALCULATOR, () => new StandingsCalculator());
  container.register(KEYS.COHORT_CLASSIFIER, () => new CohortClassifier());
  container.register(
    KEYS.SYNTHETIC_GAME_SYNTHESIZER,
    () => new SyntheticGameSynthesizer(container.resolve(KEYS.TEAM_SCORE_CLIENT))
  );
  container.register(KEYS.STANDINGS_ASSEMBLER, () => new StandingsAssembler());
  container.register(
    KEYS.SEASON_RESOLUTION_SERVICE,
    () =>
      new SeasonResolutionService(
        container.resolve(KEYS.FORMAT_CATALOG),
        container.resolve(KEYS.COHORT_OVERRIDES),
        container.resolve(KEYS.GAME_REPO),
        container.resolve(KEYS.STANDINGS_CALCULATOR),
        container.resolve(KEYS.COHORT_CLASSIFIER),
        container.resolve(KEYS.BRACKET_PROGRESSOR),
        container.resolve(KEYS.SYNTHETIC_GAME_SYNTHESIZER),
        container.resolve(KEYS.STANDINGS_ASSEMBLER),
        env.SEASON_CONCURRENCY
      )
  );
}

// Auto-run bootstrap when this module is imported
bootstrap();
