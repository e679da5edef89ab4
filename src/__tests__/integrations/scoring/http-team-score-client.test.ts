import { AxiosError, AxiosHeaders, AxiosInstance } from 'axios';
import {
  HttpTeamScoreClient,
  isTransientError,
  sumStarterPoints,
} from '../../../integrations/scoring/http-team-score-client';
import { RateLimiter } from '../../../integrations/scoring/rate-limiter';
import { ExternalApiException } from '../../../utils/exceptions';

function httpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
    status,
    statusText: '',
    headers: {},
    config,
    data: {},
  });
}

const LINEUP_PATH = '/leagues/test-league/seasons/2018/weeks/15/teams/t9/lineup';

describe('HttpTeamScoreClient', () => {
  let get: jest.Mock;
  let sleep: jest.Mock;
  let client: HttpTeamScoreClient;

  beforeEach(() => {
    get = jest.fn();
    sleep = jest.fn(async () => undefined);
    client = new HttpTeamScoreClient(
      {
        baseUrl: 'http://scores.test',
        leagueId: 'test-league',
        timeoutMs: 1000,
        maxRetries: 2,
        retryBaseDelayMs: 100,
        jitterFactor: 0.1,
        sleep,
        random: () => 0.5,
      },
      new RateLimiter({ maxConcurrent: 1, requestsPerMinute: 0, minDelayMs: 0, jitterFactor: 0 }),
      { get } as unknown as AxiosInstance
    );
  });

  it('sums starter points and skips the bench', async () => {
    get.mockResolvedValue({
      data: {
        players: [
          { playerId: 'p1', lineupStatus: 'starter', fantasyPoints: 20.5 },
          { playerId: 2, lineupStatus: 'bench', fantasyPoints: 30 },
          { playerId: 'p3', lineupStatus: 'Starter', fantasyPoints: 10.25 },
          { playerId: 'p4', lineupStatus: 'starter', fantasyPoints: null },
        ],
      },
    });

    await expect(client.getStarterScore('t9', 2018, 15)).resolves.toBe(30.75);
    expect(get).toHaveBeenCalledWith(LINEUP_PATH);
  });

  it('retries a 503 with backoff and jitter', async () => {
    get.mockRejectedValueOnce(httpError(503)).mockResolvedValueOnce({ data: { players: [] } });

    await expect(client.getStarterScore('t9', 2018, 15)).resolves.toBe(0);
    expect(get).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(105);
  });

  it('retries rate-limit responses', async () => {
    get
      .mockRejectedValueOnce(httpError(429))
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValueOnce({ data: { players: [{ playerId: 'p1', lineupStatus: 'starter', fantasyPoints: 7 }] } });

    await expect(client.getStarterScore('t9', 2018, 15)).resolves.toBe(7);
    expect(sleep.mock.calls).toEqual([[105], [210]]);
  });

  it('fails fast on other client errors', async () => {
    get.mockRejectedValue(httpError(404));

    const promise = client.getStarterScore('t9', 2018, 15);

    await expect(promise).rejects.toThrow(
      new ExternalApiException(
        'ScoreAPI',
        'lineup team=t9 season=2018 week=15',
        'Request failed with status code 404',
        404
      )
    );
    await expect(promise).rejects.toMatchObject({ statusCode: 404 });
    expect(get).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after maxRetries on network errors', async () => {
    get.mockRejectedValue(new AxiosError('socket hang up', 'ECONNRESET'));

    await expect(client.getStarterScore('t9', 2018, 15)).rejects.toMatchObject({
      message: '[ScoreAPI] lineup team=t9 season=2018 week=15: socket hang up',
      statusCode: 502,
    });
    expect(get).toHaveBeenCalledTimes(3);
  });

  it('reports exhausted timeouts as a 504', async () => {
    get.mockRejectedValue(new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED'));

    await expect(client.getStarterScore('t9', 2018, 15)).rejects.toMatchObject({
      message: '[ScoreAPI] lineup team=t9 season=2018 week=15: Request timed out',
      statusCode: 504,
    });
  });

  it('rejects responses that do not match the lineup shape', async () => {
    get.mockResolvedValue({ data: { players: [{ playerId: 'p1' }] } });

    await expect(client.getStarterScore('t9', 2018, 15)).rejects.toThrow(
      'Invalid response: players.0.lineupStatus: Required'
    );
  });
});

describe('isTransientError', () => {
  it('classifies responses and network failures', () => {
    expect(isTransientError(httpError(500))).toBe(true);
    expect(isTransientError(httpError(429))).toBe(true);
    expect(isTransientError(httpError(400))).toBe(false);
    expect(isTransientError(new AxiosError('getaddrinfo EAI_AGAIN', 'EAI_AGAIN'))).toBe(true);
    expect(isTransientError(new Error('not from axios'))).toBe(false);
  });
});

describe('sumStarterPoints', () => {
  it('rounds to two decimals', () => {
    expect(
      sumStarterPoints({
        players: [
          { playerId: 'a', lineupStatus: 'starter', fantasyPoints: 0.1 },
          { playerId: 'b', lineupStatus: 'starter', fantasyPoints: 0.2 },
        ],
      })
    ).toBe(0.3);
  });
});
