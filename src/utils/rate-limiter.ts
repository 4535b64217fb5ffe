import type { Logger } from '../types/logger.types.js';
import { isRateLimitError, RateLimitedError } from './errors.js';

export interface RateLimiterOptions {
  /** Minimum spacing between the start of two calls. */
  minIntervalMs?: number;
  /** Pause after a rate-limit signal before retrying the same call. */
  cooldownMs?: number;
  /** Unset means retry until upstream lets the call through. */
  maxRateLimitRetries?: number;
  isRateLimited?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

export const DEFAULT_MIN_INTERVAL_MS = 100;
export const DEFAULT_COOLDOWN_MS = 60_000;

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly cooldownMs: number;
  private readonly maxRateLimitRetries: number | undefined;
  private readonly isRateLimited: (error: unknown) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;

  private lastRequestTime: number | null = null;
  private requestCount = 0;
  private rateLimitHits = 0;
  // Every call is chained here so spacing holds even with concurrent callers.
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.maxRateLimitRetries = options.maxRateLimitRetries;
    this.isRateLimited = options.isRateLimited ?? isRateLimitError;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? console;
  }

  schedule<T>(call: () => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.execute(call));
    // The caller gets the failure through `run`; the chain itself keeps going.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  stats(): { calls: number; rateLimitHits: number } {
    return { calls: this.requestCount, rateLimitHits: this.rateLimitHits };
  }

  private async execute<T>(call: () => Promise<T>): Promise<T> {
    let retries = 0;

    for (;;) {
      await this.throttle();

      try {
        return await call();
      } catch (error) {
        if (!this.isRateLimited(error)) {
          throw error;
        }

        this.rateLimitHits++;
        if (this.maxRateLimitRetries !== undefined && retries >= this.maxRateLimitRetries) {
          throw new RateLimitedError(retries, { cause: error });
        }

        retries++;
        this.logger.warn(`⏳ Rate limit exceeded. Waiting ${Math.round(this.cooldownMs / 1000)} seconds...`);
        await this.sleep(this.cooldownMs);
      }
    }
  }

  private async throttle(): Promise<void> {
    if (this.lastRequestTime !== null) {
      const timeSinceLastRequest = this.now() - this.lastRequestTime;
      if (timeSinceLastRequest < this.minIntervalMs) {
        await this.sleep(this.minIntervalMs - timeSinceLastRequest);
      }
    }

    this.lastRequestTime = this.now();
    this.requestCount++;
  }
}
