import { elapsedSince, type LimiterOptions, type RateLimiter } from "./rateLimiter";
import { InMemoryStateStore, type StateStore } from "./stateStore";
import { type Clock, monotonicClock } from "../utils/clock";

export interface LeakyBucketState {
  queued: number;
  lastLeak: number;
}

/**
 * Each admitted request occupies one slot in a per-client queue that drains
 * at `leakRate` units per second. Requests are admitted while the queue
 * holds fewer than `bucketSize` units.
 *
 * With `leakRate` 0 nothing ever drains: once full, a client stays denied
 * and `retryAfter` reports Infinity.
 */
export class LeakyBucketLimiter implements RateLimiter {
  readonly algorithm = "leaky_bucket";

  private readonly clock: Clock;
  private readonly store: StateStore<LeakyBucketState>;

  constructor(
    readonly leakRate: number,
    readonly bucketSize: number,
    options: LimiterOptions<LeakyBucketState> = {}
  ) {
    this.clock = options.clock ?? monotonicClock;
    this.store = options.store ?? new InMemoryStateStore();
  }

  isRequestAllowed(clientId: string): Promise<boolean> {
    return this.store.evaluate(
      clientId,
      () => ({ queued: 0, lastLeak: this.clock.now() }),
      (bucket) => {
        const now = this.clock.now();
        bucket.queued = this.leaked(bucket, now);
        bucket.lastLeak = now;

        if (bucket.queued < this.bucketSize) {
          bucket.queued += 1;
          return true;
        }

        return false;
      }
    );
  }

  retryAfter(clientId: string): Promise<number> {
    return this.store.inspect(clientId, (bucket) => {
      const queued = bucket ? this.leaked(bucket, this.clock.now()) : 0;

      if (queued < this.bucketSize) return 0;
      if (this.leakRate <= 0 || this.bucketSize <= 0) {
        return Number.POSITIVE_INFINITY;
      }

      return ((queued - this.bucketSize + 1) / this.leakRate) * 1000;
    });
  }

  private leaked(bucket: LeakyBucketState, now: number): number {
    const elapsedSeconds = elapsedSince(bucket.lastLeak, now) / 1000;
    return Math.max(0, bucket.queued - elapsedSeconds * Math.max(0, this.leakRate));
  }
}
