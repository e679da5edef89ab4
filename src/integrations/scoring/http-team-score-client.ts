import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { TeamScoreLookup } from './team-score-lookup.interface';
import { RateLimiter } from './rate-limiter';
import { roundPoints } from '../../domain/playoff';
import { ExternalApiException } from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

const API_NAME = 'ScoreAPI';

const lineupResponseSchema = z.object({
  players: z.array(
    z.object({
      playerId: z.union([z.string(), z.number()]).transform(String),
      lineupStatus: z.string(),
      fantasyPoints: z.number().finite().nullable().default(0),
    })
  ),
});

export type LineupResponse = z.infer<typeof lineupResponseSchema>;

export interface HttpTeamScoreClientOptions {
  baseUrl: string;
  leagueId: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  jitterFactor: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/** Network error codes that indicate transient failures worth retrying */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

/**
 * Returns true for 429, 5xx, timeouts and network-level errors.
 * Other 4xx responses are permanent.
 */
export function isTransientError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;

  if (error.code && TRANSIENT_NETWORK_CODES.has(error.code)) return true;
  if (error.message.includes('timeout')) return true;

  const status = error.response?.status;
  if (status === 429) return true;
  return status !== undefined && status >= 500;
}

function isTimeout(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
}

/**
 * Sums starter points from a remote lineup service.
 *
 * Every request goes through the shared RateLimiter; transient failures are
 * retried with exponential backoff and jitter, then surface as
 * ExternalApiException.
 */
export class HttpTeamScoreClient implements TeamScoreLookup {
  private readonly client: AxiosInstance;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly options: HttpTeamScoreClientOptions,
    private readonly rateLimiter: RateLimiter,
    client?: AxiosInstance
  ) {
    this.client =
      client ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: { Accept: 'application/json' },
      });
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
  }

  async getStarterScore(teamId: string, season: number, week: number): Promise<number> {
    const path =
      `/leagues/${encodeURIComponent(this.options.leagueId)}/seasons/${season}` +
      `/weeks/${week}/teams/${encodeURIComponent(teamId)}/lineup`;
    const operation = `lineup team=${teamId} season=${season} week=${week}`;

    let data: unknown;
    try {
      data = await this.withRetry(async () => {
        const response = await this.rateLimiter.schedule(() => this.client.get<unknown>(path));
        return response.data;
      }, operation);
    } catch (error) {
      if (isTimeout(error)) {
        throw ExternalApiException.timeout(API_NAME, operation);
      }
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw ExternalApiException.fromError(API_NAME, operation, error, status ?? 502);
    }

    const parsed = lineupResponseSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw ExternalApiException.invalidResponse(API_NAME, operation, `${issue.path.join('.')}: ${issue.message}`);
    }

    return sumStarterPoints(parsed.data);
  }

  /**
   * Execute a request with retry logic for transient failures.
   * Backoff doubles from retryBaseDelayMs, stretched by up to jitterFactor.
   */
  private async withRetry<T>(fn: () => Promise<T>, context: string): Promise<T> {
    const { maxRetries, retryBaseDelayMs, jitterFactor } = this.options;

    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= maxRetries || !isTransientError(error)) {
          throw error;
        }
        const delay = Math.round(retryBaseDelayMs * Math.pow(2, attempt) * (1 + jitterFactor * this.random()));
        logger.warn('Score API transient error, retrying', {
          context,
          attempt: attempt + 1,
          maxRetries,
          delay,
          errorMessage: error instanceof Error ? error.message : String(error),
          errorCode: axios.isAxiosError(error) ? error.code : undefined,
          status: axios.isAxiosError(error) ? error.response?.status : undefined,
        });
        await this.sleep(delay);
      }
    }
  }
}

export function sumStarterPoints(lineup: LineupResponse): number {
  const total = lineup.players
    .filter((player) => player.lineupStatus.toLowerCase() === 'starter')
    .reduce((sum, player) => sum + (player.fantasyPoints ?? 0), 0);
  return roundPoints(total);
}
