import { BracketFormat } from '../formats/format.model';
import { CohortOverride } from '../formats/formats.schemas';
import { TeamRecord } from '../standings/standings.model';
import { CohortMember, CohortName, SeasonCohorts } from './playoff.model';
import { CohortSizeMismatchError } from '../../utils/exceptions';

/**
 * Partitions seed-ordered records into championship, middle and consolation cohorts.
 *
 * Without an override, cohorts are consecutive slices of seed order. With one,
 * the override's ordered id lists decide membership and seed order; the
 * consolation list may be omitted and is then the remaining teams in standings
 * order.
 */
export class CohortClassifier {
  classify(records: readonly TeamRecord[], format: BracketFormat, override?: CohortOverride | null): SeasonCohorts {
    if (records.length !== format.totalTeams) {
      throw new CohortSizeMismatchError(
        'season',
        format.totalTeams,
        records.length,
        `format ${format.name} has ${format.totalTeams} teams`
      );
    }

    return override ? this.fromOverride(records, format, override) : this.fromSeedOrder(records, format);
  }

  private fromSeedOrder(records: readonly TeamRecord[], format: BracketFormat): SeasonCohorts {
    const middleStart = format.championshipSize;
    const consolationStart = middleStart + format.middleSize;
    return {
      championship: toMembers(records.slice(0, middleStart), 1),
      middle: toMembers(records.slice(middleStart, consolationStart), middleStart + 1),
      consolation: toMembers(records.slice(consolationStart), consolationStart + 1),
    };
  }

  private fromOverride(records: readonly TeamRecord[], format: BracketFormat, override: CohortOverride): SeasonCohorts {
    const byId = new Map(records.map((record) => [record.teamId, record]));
    const assigned = new Set<string>();

    const pick = (cohort: CohortName, teamIds: readonly string[], expected: number): TeamRecord[] => {
      if (teamIds.length !== expected) {
        throw new CohortSizeMismatchError(cohort, expected, teamIds.length, 'override list size');
      }
      return teamIds.map((teamId) => {
        const record = byId.get(teamId);
        if (!record) {
          throw new CohortSizeMismatchError(cohort, expected, teamIds.length, `unknown team ${teamId} in override`);
        }
        if (assigned.has(teamId)) {
          throw new CohortSizeMismatchError(
            cohort,
            expected,
            teamIds.length,
            `team ${teamId} is assigned to more than one cohort`
          );
        }
        assigned.add(teamId);
        return record;
      });
    };

    const championship = pick('championship', override.championship, format.championshipSize);
    const middle = pick('middle', override.middle, format.middleSize);
    const consolationIds =
      override.consolation ?? records.filter((record) => !assigned.has(record.teamId)).map((record) => record.teamId);
    const consolation = pick('consolation', consolationIds, format.consolationSize);

    const middleStart = format.championshipSize;
    const consolationStart = middleStart + format.middleSize;
    return {
      championship: toMembers(championship, 1),
      middle: toMembers(middle, middleStart + 1),
      consolation: toMembers(consolation, consolationStart + 1),
    };
  }
}

function toMembers(records: readonly TeamRecord[], firstSeed: number): CohortMember[] {
  return records.map((record, index) => ({
    seed: firstSeed + index,
    teamId: record.teamId,
    teamName: record.teamName,
  }));
}

/**
 * All members of a season, best seed first.
 */
export function allMembers(cohorts: SeasonCohorts): CohortMember[] {
  return [...cohorts.championship, ...cohorts.middle, ...cohorts.consolation];
}
