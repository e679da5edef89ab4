import { ChampionshipEngine } from '../../../modules/playoffs/engines';
import { FormatCatalog } from '../../../modules/formats/format-catalog';
import { Game } from '../../../modules/games/games.model';
import { UnresolvedBracketGameError } from '../../../utils/exceptions';
import { logger } from '../../../config/logger.config';
import { createGame, createMembers, teamIds } from '../../helpers/season-fixtures';

const catalog = FormatCatalog.fromFile();

function runWeeks(engine: ChampionshipEngine, weeks: number[]): void {
  for (const week of weeks) {
    engine.advanceFromWeek(week);
  }
}

describe('ChampionshipEngine', () => {
  describe('four teams, no byes', () => {
    const format = catalog.getFormat(2011);
    const members = createMembers(teamIds(4), 1);
    const semifinals: Game[] = [createGame(15, 't4', 95, 't1', 110), createGame(15, 't2', 100, 't3', 120)];
    const finals: Game[] = [createGame(16, 't1', 125, 't3', 130), createGame(16, 't2', 115, 't4', 90)];

    it('plays semifinals from the first-round pairings, then the final and third-place game', () => {
      const engine = new ChampionshipEngine({ season: 2011, format, members, games: [...semifinals, ...finals] });

      const week15 = engine.advanceFromWeek(15);
      expect(week15).toEqual({
        advanced: true,
        nodesResolved: 2,
        bracketComplete: false,
        message: 'Resolved 2 championship games in week 15',
      });
      expect(engine.currentState).toBe('SEMIFINAL_COMPLETE');

      engine.advanceFromWeek(16);
      expect(engine.isComplete).toBe(true);

      const result = engine.getResult();
      expect(result.nodes.map((node) => [node.roundName, node.label, node.winnerId, node.loserId])).toEqual([
        ['semifinal', 'Semifinal', 't1', 't4'],
        ['semifinal', 'Semifinal', 't3', 't2'],
        ['championship', 'Championship Game', 't3', 't1'],
        ['third_place', 'Third Place Game', 't2', 't4'],
      ]);
      expect(Object.fromEntries(result.placements)).toEqual({ t3: 1, t1: 2, t2: 3, t4: 4 });
    });

    it('does nothing in weeks with no round due', () => {
      const engine = new ChampionshipEngine({ season: 2011, format, members, games: semifinals });

      expect(engine.advanceFromWeek(14)).toEqual({
        advanced: false,
        nodesResolved: 0,
        bracketComplete: false,
        message: 'No championship games due in week 14',
      });
      expect(engine.currentState).toBe('SEEDED');
    });

    it('throws when the championship game is missing', () => {
      const engine = new ChampionshipEngine({ season: 2011, format, members, games: [...semifinals, finals[1]] });
      engine.advanceFromWeek(15);

      expect(() => engine.advanceFromWeek(16)).toThrow(
        new UnresolvedBracketGameError(2011, 16, 'championship', ['t1', 't3'])
      );
    });

    it('does not match synthetic games', () => {
      const synthetic = createGame(15, 't1', 110, 't4', 95, { isSynthetic: true, syntheticKind: 'mediocre_bowl' });
      const engine = new ChampionshipEngine({ season: 2011, format, members, games: [synthetic, semifinals[1]] });

      expect(() => engine.advanceFromWeek(15)).toThrow(
        'Season 2011 week 15: no semifinal game found for teams [t1, t4]'
      );
    });

    it('uses the first of duplicate games and warns', () => {
      const warn = jest.spyOn(logger, 'warn');
      const duplicate = createGame(15, 't1', 50, 't4', 60);
      const engine = new ChampionshipEngine({
        season: 2011,
        format,
        members,
        games: [...semifinals, duplicate, ...finals],
      });

      engine.advanceFromWeek(15);

      expect(engine.getResult().nodes[0].winnerId).toBe('t1');
      expect(warn).toHaveBeenCalledWith('Season 2011 week 15: 2 games for one semifinal pairing', {
        teams: ['t1', 't4'],
      });
      warn.mockRestore();
    });
  });

  describe('six teams with byes', () => {
    const format = catalog.getFormat(2018);
    const members = createMembers(teamIds(6), 1);
    const roundOne: Game[] = [createGame(14, 't3', 100, 't6', 110), createGame(14, 't4', 105, 't5', 95)];
    const semifinals: Game[] = [createGame(15, 't1', 120, 't4', 100), createGame(15, 't6', 99, 't2', 98)];
    const finals: Game[] = [createGame(16, 't1', 130, 't6', 129), createGame(16, 't4', 100, 't2', 111)];
    const fifthPlace = createGame(16, 't3', 85, 't5', 90);

    it('walks round 1, semifinals and the final week through every state', () => {
      const engine = new ChampionshipEngine({
        season: 2018,
        format,
        members,
        games: [...roundOne, ...semifinals, ...finals, fifthPlace],
      });

      expect(engine.currentState).toBe('SEEDED');
      engine.advanceFromWeek(14);
      expect(engine.currentState).toBe('ROUND1_COMPLETE');
      engine.advanceFromWeek(15);
      expect(engine.currentState).toBe('SEMIFINAL_COMPLETE');
      engine.advanceFromWeek(16);
      expect(engine.currentState).toBe('RESOLVED');

      const result = engine.getResult();
      expect(result.nodes.map((node) => [node.roundName, node.week, node.winnerId, node.loserId])).toEqual([
        ['round_1', 14, 't6', 't3'],
        ['round_1', 14, 't4', 't5'],
        ['semifinal', 15, 't1', 't4'],
        ['semifinal', 15, 't6', 't2'],
        ['championship', 16, 't1', 't6'],
        ['third_place', 16, 't2', 't4'],
        ['fifth_place', 16, 't5', 't3'],
      ]);
      expect(Object.fromEntries(result.placements)).toEqual({ t1: 1, t6: 2, t2: 3, t4: 4, t5: 5, t3: 6 });
    });

    it('reports a completed bracket without reprocessing', () => {
      const engine = new ChampionshipEngine({
        season: 2018,
        format,
        members,
        games: [...roundOne, ...semifinals, ...finals, fifthPlace],
      });
      runWeeks(engine, [14, 15, 16]);

      expect(engine.advanceFromWeek(17)).toEqual({
        advanced: false,
        nodesResolved: 0,
        bracketComplete: true,
        message: 'championship bracket already resolved',
      });
    });

    it('leaves round-1 losers unplaced when the fifth-place game is missing', () => {
      const warn = jest.spyOn(logger, 'warn');
      const engine = new ChampionshipEngine({
        season: 2018,
        format,
        members,
        games: [...roundOne, ...semifinals, ...finals],
      });

      runWeeks(engine, [14, 15, 16]);

      expect(engine.isComplete).toBe(true);
      expect(Object.fromEntries(engine.getResult().placements)).toEqual({ t1: 1, t6: 2, t2: 3, t4: 4 });
      expect(warn).toHaveBeenCalledWith(
        'Season 2018 week 16: no fifth place game, round-1 losers fall back to seed order',
        { teams: ['t3', 't5'] }
      );
      warn.mockRestore();
    });

    it('throws when a bye seed meets no first-round winner', () => {
      const engine = new ChampionshipEngine({
        season: 2018,
        format,
        members,
        games: [...roundOne, createGame(15, 't1', 100, 't2', 90)],
      });
      engine.advanceFromWeek(14);

      expect(() => engine.advanceFromWeek(15)).toThrow(
        'Season 2018 week 15: no semifinal game found for teams [t1, t6, t4] (seed 1 must meet a first-round winner)'
      );
    });
  });
});
