import { ValidationException } from '../../utils/exceptions';

export interface RateLimiterOptions {
  /** Requests allowed in flight at once */
  maxConcurrent: number;
  /** Request starts allowed per rolling minute; 0 disables the budget */
  requestsPerMinute: number;
  /** Minimum gap between two request starts */
  minDelayMs: number;
  /** Waits are stretched by up to this fraction */
  jitterFactor: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const WINDOW_MS = 60_000;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Paces calls to a remote source that does not publish its own limits.
 *
 * Concurrency slots are handed to waiters in arrival order; start times are
 * spaced by minDelayMs and capped at requestsPerMinute over a rolling window.
 */
export class RateLimiter {
  private active = 0;
  private readonly waiters: Array<() => void> = [];
  private readonly startTimes: number[] = [];
  private lastStart = Number.NEGATIVE_INFINITY;
  private pacing: Promise<void> = Promise.resolve();

  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly options: RateLimiterOptions) {
    if (options.maxConcurrent < 1) {
      throw new ValidationException('RateLimiter maxConcurrent must be at least 1');
    }
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    await this.acquireSlot();
    try {
      await this.waitForTurn();
      return await task();
    } finally {
      this.releaseSlot();
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiters.length;
  }

  private async acquireSlot(): Promise<void> {
    if (this.active < this.options.maxConcurrent) {
      this.active++;
      return;
    }
    // The releasing task hands its slot over, so active stays unchanged
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private releaseSlot(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }

  /**
   * Start times are decided one caller at a time.
   */
  private waitForTurn(): Promise<void> {
    const turn = this.pacing.then(() => this.waitForPacing());
    this.pacing = turn;
    return turn;
  }

  private async waitForPacing(): Promise<void> {
    const { requestsPerMinute, minDelayMs } = this.options;

    for (;;) {
      const now = this.now();
      while (this.startTimes.length > 0 && now - this.startTimes[0] >= WINDOW_MS) {
        this.startTimes.shift();
      }

      let wait = this.lastStart + minDelayMs - now;
      if (requestsPerMinute > 0 && this.startTimes.length >= requestsPerMinute) {
        wait = Math.max(wait, WINDOW_MS - (now - this.startTimes[0]));
      }
      if (wait <= 0) break;

      await this.sleep(this.withJitter(wait));
    }

    const startedAt = this.now();
    this.startTimes.push(startedAt);
    this.lastStart = startedAt;
  }

  private withJitter(ms: number): number {
    return Math.round(ms * (1 + this.options.jitterFactor * this.random()));
  }
}
