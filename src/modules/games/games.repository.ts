import { promises as fs } from 'fs';
import path from 'path';
import { Game } from './games.model';
import { RawGame, scheduleFileSchema } from './games.schemas';
import { ValidationException } from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

/**
 * Source of a season's recorded games (the schedule-scraping layer).
 */
export interface GameRepository {
  getGames(season: number): Promise<Game[]>;
}

// Errors raised by fs may belong to another realm's Error class
function isFileNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export function gameFromRaw(row: RawGame): Game {
  return {
    week: row.week,
    homeTeamId: row.home_team_id,
    homeTeamName: row.home_team,
    homePoints: row.home_points,
    awayTeamId: row.away_team_id,
    awayTeamName: row.away_team,
    awayPoints: row.away_points,
    isSynthetic: row.is_simulated,
    syntheticKind: row.simulation_type,
  };
}

/**
 * Reads `<dataDir>/<season>/schedule.json`.
 * A season with no file yields no games; the standings calculator reports
 * that as missing data.
 */
export class JsonGameRepository implements GameRepository {
  constructor(private readonly dataDir: string) {}

  async getGames(season: number): Promise<Game[]> {
    const filePath = path.resolve(this.dataDir, String(season), 'schedule.json');

    let contents: string;
    try {
      contents = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        logger.warn(`No schedule file for season ${season}`, { filePath });
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      throw new ValidationException(
        `Schedule file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const result = scheduleFileSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ValidationException(
        `Schedule file ${filePath} is malformed at ${issue.path.join('.')}: ${issue.message}`
      );
    }

    return result.data.map(gameFromRaw);
  }
}

/**
 * Holds games in memory, keyed by season. Used by tests and by callers that
 * already have games loaded from another store.
 */
export class InMemoryGameRepository implements GameRepository {
  private readonly gamesBySeason = new Map<number, Game[]>();

  constructor(initial: Record<number, Game[]> = {}) {
    for (const [season, games] of Object.entries(initial)) {
      this.gamesBySeason.set(parseInt(season, 10), games);
    }
  }

  async getGames(season: number): Promise<Game[]> {
    return [...(this.gamesBySeason.get(season) ?? [])];
  }
}
