import { Game } from '../games/games.model';
import { TeamRecord, emptyRecord } from './standings.model';
import { MissingDataError } from '../../utils/exceptions';
import { roundPoints, sortStandingsForSeeding } from '../../domain/playoff';

/**
 * Folds regular-season games into per-team records and seed order.
 *
 * Records live only for one call, so seasons never share state.
 */
export class StandingsCalculator {
  /**
   * @param regularSeasonWeeks - last regular-season week; later weeks are ignored
   * @returns Records in seed order (win% DESC, points for DESC, then first appearance)
   * @throws MissingDataError when no regular-season game exists
   */
  calculate(season: number, games: readonly Game[], regularSeasonWeeks: number): TeamRecord[] {
    const regularSeason = games.filter(
      (game) => !game.isSynthetic && game.week >= 1 && game.week <= regularSeasonWeeks
    );
    if (regularSeason.length === 0) {
      throw new MissingDataError(season, 1, regularSeasonWeeks);
    }

    // Map keeps first-appearance order, which is the only order left once
    // win% and points for are both level
    const records = new Map<string, TeamRecord>();
    const recordFor = (teamId: string, teamName: string): TeamRecord => {
      let record = records.get(teamId);
      if (!record) {
        record = emptyRecord(teamId, teamName);
        records.set(teamId, record);
      } else if (!record.teamName && teamName) {
        record.teamName = teamName;
      }
      return record;
    };

    for (const game of regularSeason) {
      const home = recordFor(game.homeTeamId, game.homeTeamName);
      const away = recordFor(game.awayTeamId, game.awayTeamName);
      this.applyResult(home, game.homePoints, game.awayPoints);
      this.applyResult(away, game.awayPoints, game.homePoints);
    }

    const folded = [...records.values()].map((record) => ({
      ...record,
      pointsFor: roundPoints(record.pointsFor),
      pointsAgainst: roundPoints(record.pointsAgainst),
    }));

    return sortStandingsForSeeding(folded);
  }

  private applyResult(record: TeamRecord, points: number, opponentPoints: number): void {
    record.pointsFor += points;
    record.pointsAgainst += opponentPoints;
    if (points > opponentPoints) {
      record.wins++;
    } else if (points < opponentPoints) {
      record.losses++;
    } else {
      record.ties++;
    }
  }
}
