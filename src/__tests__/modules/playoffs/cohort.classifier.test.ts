import { CohortClassifier, allMembers } from '../../../modules/playoffs/cohort.classifier';
import { FormatCatalog } from '../../../modules/formats/format-catalog';
import { StandingsCalculator } from '../../../modules/standings/standings.calculator';
import { TeamRecord } from '../../../modules/standings/standings.model';
import { CohortSizeMismatchError } from '../../../utils/exceptions';
import { createRoundRobin, teamIds } from '../../helpers/season-fixtures';

describe('CohortClassifier', () => {
  const catalog = FormatCatalog.fromFile();
  const classifier = new CohortClassifier();

  function seededRecords(count: number): TeamRecord[] {
    return new StandingsCalculator().calculate(2000, createRoundRobin(teamIds(count)), 1);
  }

  it('slices seed order into cohorts with global seeds', () => {
    const cohorts = classifier.classify(seededRecords(12), catalog.getFormat(2013));

    expect(cohorts.championship.map((m) => [m.seed, m.teamId])).toEqual([
      [1, 't1'],
      [2, 't2'],
      [3, 't3'],
      [4, 't4'],
    ]);
    expect(cohorts.middle.map((m) => [m.seed, m.teamId])).toEqual([
      [5, 't5'],
      [6, 't6'],
      [7, 't7'],
      [8, 't8'],
    ]);
    expect(cohorts.consolation.map((m) => m.seed)).toEqual([9, 10, 11, 12]);
  });

  it('puts everyone outside the top four in consolation when there is no middle cohort', () => {
    const cohorts = classifier.classify(seededRecords(12), catalog.getFormat(2011));

    expect(cohorts.middle).toEqual([]);
    expect(cohorts.consolation.map((m) => m.teamId)).toEqual(['t5', 't6', 't7', 't8', 't9', 't10', 't11', 't12']);
  });

  it('follows override order and fills consolation from the remaining standings', () => {
    const cohorts = classifier.classify(seededRecords(12), catalog.getFormat(2013), {
      championship: ['t2', 't4', 't1', 't5'],
      middle: ['t8', 't6', 't7', 't11'],
    });

    expect(cohorts.championship.map((m) => [m.seed, m.teamId])).toEqual([
      [1, 't2'],
      [2, 't4'],
      [3, 't1'],
      [4, 't5'],
    ]);
    expect(cohorts.middle.map((m) => [m.seed, m.teamId])).toEqual([
      [5, 't8'],
      [6, 't6'],
      [7, 't7'],
      [8, 't11'],
    ]);
    expect(cohorts.consolation.map((m) => [m.seed, m.teamId])).toEqual([
      [9, 't3'],
      [10, 't9'],
      [11, 't10'],
      [12, 't12'],
    ]);
    expect(new Set(allMembers(cohorts).map((m) => m.teamId)).size).toBe(12);
  });

  it('rejects an override whose cohort size differs from the format', () => {
    expect(() =>
      classifier.classify(seededRecords(12), catalog.getFormat(2013), {
        championship: ['t1', 't2', 't3'],
        middle: ['t4', 't5', 't6', 't7'],
      })
    ).toThrow(new CohortSizeMismatchError('championship', 4, 3, 'override list size'));
  });

  it('rejects an override that names a team twice', () => {
    expect(() =>
      classifier.classify(seededRecords(12), catalog.getFormat(2013), {
        championship: ['t1', 't2', 't3', 't4'],
        middle: ['t4', 't5', 't6', 't7'],
      })
    ).toThrow('team t4 is assigned to more than one cohort');
  });

  it('rejects an override that names an unknown team', () => {
    expect(() =>
      classifier.classify(seededRecords(12), catalog.getFormat(2013), {
        championship: ['t1', 't2', 't3', 'ghost'],
        middle: ['t4', 't5', 't6', 't7'],
      })
    ).toThrow(CohortSizeMismatchError);
  });

  it('rejects a season whose team count does not match the format', () => {
    expect(() => classifier.classify(seededRecords(10), catalog.getFormat(2018))).toThrow(
      'Cohort season expects 12 teams but got 10'
    );
  });
});
