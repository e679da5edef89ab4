import { BracketFormat } from '../formats/format.model';
import { pointsFor } from '../games/games.model';
import { Standing } from '../standings/standings.model';
import { CohortResult, SeasonCohorts } from './playoff.model';
import { allMembers } from './cohort.classifier';
import { placeLabel, roundPoints } from '../../domain/playoff';
import { StandingsInvariantError } from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

/**
 * Merges cohort results into one standings list, places 1..N.
 *
 * Teams no placement game reached take the next open place in seed order,
 * logged as a data-quality warning.
 */
export class StandingsAssembler {
  assemble(
    season: number,
    format: BracketFormat,
    cohorts: SeasonCohorts,
    results: readonly CohortResult[]
  ): Standing[] {
    const members = allMembers(cohorts);
    const memberIds = new Set(members.map((member) => member.teamId));
    const placeByTeam = new Map<string, number>();
    const teamByPlace = new Map<number, string>();

    for (const result of results) {
      for (const [teamId, place] of result.placements) {
        if (!memberIds.has(teamId)) {
          throw new StandingsInvariantError(season, `${result.cohort} placed unknown team ${teamId}`);
        }
        if (placeByTeam.has(teamId)) {
          throw new StandingsInvariantError(season, `team ${teamId} was placed twice`);
        }
        const holder = teamByPlace.get(place);
        if (holder !== undefined) {
          throw new StandingsInvariantError(season, `place ${place} given to both ${holder} and ${teamId}`);
        }
        placeByTeam.set(teamId, place);
        teamByPlace.set(place, teamId);
      }
    }

    let nextOpen = 1;
    for (const member of members) {
      if (placeByTeam.has(member.teamId)) continue;
      while (teamByPlace.has(nextOpen)) nextOpen++;
      logger.warn(`Season ${season}: no placement game reached team ${member.teamId}, assigned place ${nextOpen}`, {
        seed: member.seed,
      });
      placeByTeam.set(member.teamId, nextOpen);
      teamByPlace.set(nextOpen, member.teamId);
    }

    this.verifyPlaces(season, format.totalTeams, teamByPlace);

    const breakdowns = this.weekBreakdowns(results);
    return members
      .map((member): Standing => {
        const place = placeByTeam.get(member.teamId);
        if (place === undefined) {
          throw new StandingsInvariantError(season, `team ${member.teamId} has no place`);
        }
        const weekBreakdown = breakdowns.get(member.teamId) ?? {};
        return {
          place,
          label: placeLabel(place),
          teamId: member.teamId,
          teamName: member.teamName,
          points: roundPoints(Object.values(weekBreakdown).reduce((sum, points) => sum + points, 0)),
          weekBreakdown,
        };
      })
      .sort((a, b) => a.place - b.place);
  }

  private verifyPlaces(season: number, totalTeams: number, teamByPlace: ReadonlyMap<number, string>): void {
    if (teamByPlace.size !== totalTeams) {
      throw new StandingsInvariantError(season, `expected ${totalTeams} places, assembled ${teamByPlace.size}`);
    }
    for (let place = 1; place <= totalTeams; place++) {
      if (!teamByPlace.has(place)) {
        throw new StandingsInvariantError(season, `place ${place} is empty`);
      }
    }
  }

  /**
   * Points per week from the games that decided each team's place.
   */
  private weekBreakdowns(results: readonly CohortResult[]): Map<string, Record<number, number>> {
    const breakdowns = new Map<string, Record<number, number>>();
    for (const result of results) {
      for (const node of result.nodes) {
        for (const teamId of [node.winnerId, node.loserId]) {
          const breakdown = breakdowns.get(teamId) ?? {};
          breakdown[node.week] = pointsFor(node.game, teamId);
          breakdowns.set(teamId, breakdown);
        }
      }
    }
    return breakdowns;
  }
}
