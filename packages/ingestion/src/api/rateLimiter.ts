import { createLogger } from '../logger';

const logger = createLogger('rate-limiter');

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface RateLimiterOptions {
  /** Minimum spacing between consecutive requests. */
  minIntervalMs?: number;
  /** Random extra delay up to this many ms, added to the spacing. */
  jitterMs?: number;
  /** Cap on a pre-emptive wait for the quota window to reset. */
  maxResetWaitMs?: number;
  sleep?: Sleep;
  now?: () => number;
}

export class RateLimiter {
  private remaining: number | null = null;
  private resetAt = 0;
  private lastRequestAt = 0;
  private readonly minIntervalMs: number;
  private readonly jitterMs: number;
  private readonly maxResetWaitMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.jitterMs = options.jitterMs ?? 0;
    this.maxResetWaitMs = options.maxResetWaitMs ?? 60_000;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  updateFromHeaders(headers: Readonly<Record<string, unknown>>): void {
    // X-RateLimit-Reset is a unix timestamp in seconds
    const remaining = Number(headers['x-ratelimit-remaining']);
    const reset = Number(headers['x-ratelimit-reset']);

    if (Number.isFinite(remaining)) this.remaining = remaining;
    if (Number.isFinite(reset) && reset > 0) this.resetAt = reset * 1000;
  }

  async waitIfNeeded(): Promise<void> {
    if (this.remaining !== null && this.remaining <= 0) {
      const msUntilReset = this.resetAt - this.now();
      if (msUntilReset > 0) {
        const waitMs = Math.min(msUntilReset + 200, this.maxResetWaitMs);
        logger.warn({ waitMs }, 'Hourly quota exhausted, waiting for reset');
        await this.sleep(waitMs);
      }
      this.remaining = null;
    }

    if (this.minIntervalMs > 0 && this.lastRequestAt > 0) {
      const jitter = this.jitterMs > 0 ? Math.random() * this.jitterMs : 0;
      const waitMs = this.lastRequestAt + this.minIntervalMs + jitter - this.now();
      if (waitMs > 0) await this.sleep(waitMs);
    }
    this.lastRequestAt = this.now();
  }
}
