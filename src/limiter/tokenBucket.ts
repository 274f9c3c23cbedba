import { elapsedSince, type LimiterOptions, type RateLimiter } from "./rateLimiter";
import { InMemoryStateStore, type StateStore } from "./stateStore";
import { type Clock, monotonicClock } from "../utils/clock";

export interface TokenBucketState {
  tokens: number;
  lastRefill: number;
}

/**
 * Each client gets a bucket that starts full and refills continuously at
 * `refillRate` tokens per second, capped at `bucketSize`. A request takes
 * one token.
 *
 * Refill is lazy: tokens added since the last call are computed from the
 * elapsed time, so no timer runs per client. Fractional tokens carry over
 * between calls.
 */
export class TokenBucketLimiter implements RateLimiter {
  readonly algorithm = "token_bucket";

  private readonly clock: Clock;
  private readonly store: StateStore<TokenBucketState>;

  constructor(
    readonly refillRate: number,
    readonly bucketSize: number,
    options: LimiterOptions<TokenBucketState> = {}
  ) {
    this.clock = options.clock ?? monotonicClock;
    this.store = options.store ?? new InMemoryStateStore();
  }

  isRequestAllowed(clientId: string): Promise<boolean> {
    return this.store.evaluate(
      clientId,
      () => ({ tokens: this.bucketSize, lastRefill: this.clock.now() }),
      (bucket) => {
        const now = this.clock.now();
        bucket.tokens = this.refilled(bucket, now);
        bucket.lastRefill = now;

        if (bucket.tokens >= 1) {
          bucket.tokens -= 1;
          return true;
        }

        return false;
      }
    );
  }

  retryAfter(clientId: string): Promise<number> {
    return this.store.inspect(clientId, (bucket) => {
      const tokens = bucket
        ? this.refilled(bucket, this.clock.now())
        : this.bucketSize;

      if (tokens >= 1) return 0;

      // One whole token is out of reach.
      if (this.refillRate <= 0 || this.bucketSize < 1) {
        return Number.POSITIVE_INFINITY;
      }

      return ((1 - tokens) / this.refillRate) * 1000;
    });
  }

  private refilled(bucket: TokenBucketState, now: number): number {
    const elapsedSeconds = elapsedSince(bucket.lastRefill, now) / 1000;
    const tokens = bucket.tokens + elapsedSeconds * Math.max(0, this.refillRate);
    return Math.max(0, Math.min(this.bucketSize, tokens));
  }
}
