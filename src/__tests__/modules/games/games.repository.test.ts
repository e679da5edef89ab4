import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  gameFromRaw,
  InMemoryGameRepository,
  JsonGameRepository,
} from '../../../modules/games/games.repository';
import { scheduleFileSchema } from '../../../modules/games/games.schemas';
import { ValidationException } from '../../../utils/exceptions';
import { createGame } from '../../helpers/season-fixtures';

describe('schedule rows', () => {
  it('coerces numeric ids and string points', () => {
    const [row] = scheduleFileSchema.parse([
      {
        week: '3',
        home_team_id: 101,
        home_team: 'Home',
        home_points: '98.5',
        away_team_id: 'abc',
        away_team: 'Away',
        away_points: 87,
      },
    ]);

    expect(gameFromRaw(row)).toEqual({
      week: 3,
      homeTeamId: '101',
      homeTeamName: 'Home',
      homePoints: 98.5,
      awayTeamId: 'abc',
      awayTeamName: 'Away',
      awayPoints: 87,
      isSynthetic: false,
      syntheticKind: null,
    });
  });

  it('keeps the synthetic marker', () => {
    const [row] = scheduleFileSchema.parse([
      {
        week: 16,
        home_team_id: 't9',
        home_points: 80,
        away_team_id: 't12',
        away_points: 70,
        is_simulated: true,
        simulation_type: 'toilet_bowl_winners',
      },
    ]);

    const game = gameFromRaw(row);
    expect(game.isSynthetic).toBe(true);
    expect(game.syntheticKind).toBe('toilet_bowl_winners');
    expect(game.homeTeamName).toBe('');
  });

  it('rejects unknown synthetic kinds and non-numeric points', () => {
    const base = { week: 1, home_team_id: 'a', home_points: 1, away_team_id: 'b', away_points: 2 };
    expect(scheduleFileSchema.safeParse([{ ...base, simulation_type: 'pizza_bowl' }]).success).toBe(false);
    expect(scheduleFileSchema.safeParse([{ ...base, home_points: 'lots' }]).success).toBe(false);
  });
});

describe('InMemoryGameRepository', () => {
  it('returns a copy of the stored games', async () => {
    const game = createGame(1, 't1', 100, 't2', 90);
    const repo = new InMemoryGameRepository({ 2015: [game] });

    const games = await repo.getGames(2015);
    games.push(createGame(2, 't1', 1, 't2', 2));

    expect(await repo.getGames(2015)).toEqual([game]);
    expect(await repo.getGames(2016)).toEqual([]);
  });
});

describe('JsonGameRepository', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'schedules-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  async function writeSchedule(season: number, contents: string): Promise<void> {
    await fs.mkdir(path.join(dataDir, String(season)));
    await fs.writeFile(path.join(dataDir, String(season), 'schedule.json'), contents);
  }

  it('reads a season schedule file', async () => {
    await writeSchedule(
      2012,
      JSON.stringify([{ week: 1, home_team_id: 't1', home_points: 110, away_team_id: 't2', away_points: 95.25 }])
    );

    const games = await new JsonGameRepository(dataDir).getGames(2012);

    expect(games).toHaveLength(1);
    expect(games[0]).toMatchObject({ homeTeamId: 't1', awayPoints: 95.25 });
  });

  it('returns no games when the season has no file', async () => {
    await expect(new JsonGameRepository(dataDir).getGames(1999)).resolves.toEqual([]);
  });

  it('rethrows read failures other than a missing file', async () => {
    const notADirectory = path.join(dataDir, 'plain-file');
    await fs.writeFile(notADirectory, '');

    await expect(new JsonGameRepository(notADirectory).getGames(2012)).rejects.toMatchObject({ code: 'ENOTDIR' });
  });

  it('rejects malformed files', async () => {
    await writeSchedule(2013, '{not json');
    await writeSchedule(2014, JSON.stringify([{ week: 1 }]));
    const repo = new JsonGameRepository(dataDir);

    await expect(repo.getGames(2013)).rejects.toThrow(ValidationException);
    await expect(repo.getGames(2014)).rejects.toThrow('is malformed at 0.home_team_id');
  });
});
