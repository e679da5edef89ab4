import { Game, SyntheticKind } from '../games/games.model';
import { BracketFormat, PlacementGroup, gameLabel, playoffWeeks } from '../formats/format.model';
import {
  CohortMember,
  CohortName,
  CohortResult,
  RoundName,
  SeasonCohorts,
  emptyCohortResult,
  recordPlacement,
} from './playoff.model';
import { ResolvedNode, bestSeed, resolveBracketNode } from './bracket-node';
import { TeamScoreLookup } from '../../integrations/scoring/team-score-lookup.interface';
import { rankByCumulativePoints, roundPoints } from '../../domain/playoff';
import { AppException, ErrorCode, ExternalScoreFetchError, ValidationException } from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

interface ScoreRequest {
  teamId: string;
  week: number;
}

const scoreKey = (teamId: string, week: number) => `${teamId}@${week}`;

/**
 * Builds placement games for cohorts that never met on the recorded schedule.
 *
 * Every synthesized score is a team's real starter score for that week; no
 * score is ever invented or defaulted. Output depends only on those scores
 * and seeds, so re-running yields identical games.
 */
export class SyntheticGameSynthesizer {
  constructor(private readonly scoreLookup: TeamScoreLookup | null) {}

  /**
   * Synthesizes every cohort the format marks as synthetic.
   */
  async synthesizeForSeason(season: number, format: BracketFormat, cohorts: SeasonCohorts): Promise<CohortResult[]> {
    const results: CohortResult[] = [];

    if (format.hasMiddleCohort && format.middleMode === 'synthetic') {
      results.push(await this.synthesizeCumulative(season, format, 'middle', cohorts.middle));
    }
    if (format.consolationMode === 'synthetic') {
      const [group] = format.consolationGroups;
      results.push(await this.synthesizeLosersAdvance(season, format, 'consolation', group, cohorts.consolation));
    }

    return results;
  }

  /**
   * Four-team losers-advance group:
   * - start week: top seed vs bottom seed, second vs third
   * - next week: round-1 losers play for the bottom two places
   * - end week: round-1 winners play for the top two places
   */
  async synthesizeLosersAdvance(
    season: number,
    format: BracketFormat,
    cohort: CohortName,
    group: PlacementGroup,
    members: readonly CohortMember[]
  ): Promise<CohortResult> {
    const result = emptyCohortResult(cohort);
    const firstPlace = bestSeed(members);
    const roundOneWeek = format.playoffStartWeek;
    const losersWeek = roundOneWeek + 1;
    const winnersWeek = format.playoffEndWeek;

    const pairs = group.pairings.map(([seedA, seedB]) =>
      orderBySeed(this.member(season, cohort, members, seedA), this.member(season, cohort, members, seedB))
    );

    const roundOneScores = await this.fetchScores(
      season,
      cohort,
      members.map((member) => ({ teamId: member.teamId, week: roundOneWeek }))
    );

    const roundOne = pairs.map(([home, away]) =>
      this.playSynthetic(
        result,
        format,
        cohort,
        'round_1',
        'toilet_bowl_round_1',
        roundOneWeek,
        home,
        away,
        roundOneScores,
        null
      )
    );

    const [losersHome, losersAway] = orderBySeed(roundOne[0].loser, roundOne[1].loser);
    const [winnersHome, winnersAway] = orderBySeed(roundOne[0].winner, roundOne[1].winner);
    const finalScores = await this.fetchScores(season, cohort, [
      { teamId: losersHome.teamId, week: losersWeek },
      { teamId: losersAway.teamId, week: losersWeek },
      { teamId: winnersHome.teamId, week: winnersWeek },
      { teamId: winnersAway.teamId, week: winnersWeek },
    ]);

    this.playSynthetic(
      result,
      format,
      cohort,
      group.bottomGame,
      'toilet_bowl_losers',
      losersWeek,
      losersHome,
      losersAway,
      finalScores,
      firstPlace + 2
    );
    this.playSynthetic(
      result,
      format,
      cohort,
      group.topGame,
      'toilet_bowl_winners',
      winnersWeek,
      winnersHome,
      winnersAway,
      finalScores,
      firstPlace
    );

    logger.info(`Season ${season}: synthesized ${result.syntheticGames.length} ${cohort} games`);
    return result;
  }

  /**
   * Multi-week cumulative cohort: seed i meets seed n+1-i every playoff week
   * and the cohort is ranked by summed points.
   */
  async synthesizeCumulative(
    season: number,
    format: BracketFormat,
    cohort: CohortName,
    members: readonly CohortMember[]
  ): Promise<CohortResult> {
    const result = emptyCohortResult(cohort);
    const seeded = [...members].sort((a, b) => a.seed - b.seed);
    const weeks = playoffWeeks(format);

    const scores = await this.fetchScores(
      season,
      cohort,
      weeks.flatMap((week) => seeded.map((member) => ({ teamId: member.teamId, week })))
    );

    const totals = new Map<string, number>(seeded.map((member) => [member.teamId, 0]));
    for (const week of weeks) {
      for (let i = 0; i < seeded.length / 2; i++) {
        const home = seeded[i];
        const away = seeded[seeded.length - 1 - i];
        this.playSynthetic(result, format, cohort, 'mediocre_bowl', 'mediocre_bowl', week, home, away, scores, null);
        for (const team of [home, away]) {
          const points = lookupScore(scores, team.teamId, week);
          totals.set(team.teamId, roundPoints((totals.get(team.teamId) ?? 0) + points));
        }
      }
    }

    const firstPlace = bestSeed(seeded);
    rankByCumulativePoints(
      seeded.map((member) => ({
        teamId: member.teamId,
        seed: member.seed,
        totalPoints: totals.get(member.teamId) ?? 0,
      }))
    ).forEach((entry, index) => {
      result.placements.set(entry.teamId, firstPlace + index);
    });

    logger.info(`Season ${season}: synthesized ${result.syntheticGames.length} ${cohort} games`);
    return result;
  }

  private playSynthetic(
    result: CohortResult,
    format: BracketFormat,
    cohort: CohortName,
    roundName: RoundName,
    kind: SyntheticKind,
    week: number,
    home: CohortMember,
    away: CohortMember,
    scores: ReadonlyMap<string, number>,
    placeAwarded: number | null
  ): ResolvedNode {
    const game: Game = {
      week,
      homeTeamId: home.teamId,
      homeTeamName: home.teamName,
      homePoints: lookupScore(scores, home.teamId, week),
      awayTeamId: away.teamId,
      awayTeamName: away.teamName,
      awayPoints: lookupScore(scores, away.teamId, week),
      isSynthetic: true,
      syntheticKind: kind,
    };
    const resolved = resolveBracketNode(
      cohort,
      roundName,
      gameLabel(format, roundName),
      game,
      home,
      away,
      placeAwarded
    );
    result.syntheticGames.push(game);
    result.nodes.push(resolved.node);
    recordPlacement(result, resolved.node);
    return resolved;
  }

  /**
   * Fetch in parallel; the first failure fails the cohort.
   */
  private async fetchScores(
    season: number,
    cohort: CohortName,
    requests: readonly ScoreRequest[]
  ): Promise<Map<string, number>> {
    const lookup = this.scoreLookup;
    if (!lookup) {
      throw new ValidationException(
        `Season ${season}: the ${cohort} cohort needs starter scores but no score client is configured ` +
          '(set SCORE_API_BASE_URL and SCORE_API_LEAGUE_ID)'
      );
    }

    const entries = await Promise.all(
      requests.map(async ({ teamId, week }): Promise<[string, number]> => {
        try {
          return [scoreKey(teamId, week), await lookup.getStarterScore(teamId, season, week)];
        } catch (error) {
          throw new ExternalScoreFetchError(season, cohort, teamId, week, error);
        }
      })
    );
    return new Map(entries);
  }

  private member(season: number, cohort: CohortName, members: readonly CohortMember[], seed: number): CohortMember {
    const member = members.find((candidate) => candidate.seed === seed);
    if (!member) {
      throw new ValidationException(`Season ${season}: seed ${seed} is not in the ${cohort} cohort`);
    }
    return member;
  }
}

function orderBySeed(a: CohortMember, b: CohortMember): [CohortMember, CohortMember] {
  return a.seed <= b.seed ? [a, b] : [b, a];
}

function lookupScore(scores: ReadonlyMap<string, number>, teamId: string, week: number): number {
  const score = scores.get(scoreKey(teamId, week));
  if (score === undefined) {
    throw new AppException(`No score fetched for team ${teamId} in week ${week}`, ErrorCode.INTERNAL_ERROR);
  }
  return score;
}
