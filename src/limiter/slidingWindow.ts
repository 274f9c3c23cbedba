import type { LimiterOptions, RateLimiter } from "./rateLimiter";
import { InMemoryStateStore, type StateStore } from "./stateStore";
import { type Clock, monotonicClock } from "../utils/clock";

/**
 * Admission timestamps for one client, oldest first.
 *
 * Expired entries are dropped from the front by moving `head`; the backing
 * array is compacted once the dead prefix outgrows the live part.
 */
export class TimestampLog {
  private entries: number[] = [];
  private head = 0;

  get length(): number {
    return this.entries.length - this.head;
  }

  oldest(): number | undefined {
    return this.entries[this.head];
  }

  push(timestamp: number): void {
    this.entries.push(timestamp);
  }

  /** Drop every entry at or before `cutoff`. */
  dropThrough(cutoff: number): void {
    while (this.head < this.entries.length && this.entries[this.head] <= cutoff) {
      this.head += 1;
    }

    if (this.head > 0 && this.head * 2 >= this.entries.length) {
      this.entries = this.entries.slice(this.head);
      this.head = 0;
    }
  }
}

/**
 * Keeps the timestamp of every admitted request in the trailing window, so
 * the count is exact at every instant. Memory per client is bounded by
 * `limit`.
 */
export class SlidingWindowLimiter implements RateLimiter {
  readonly algorithm = "sliding_window";

  private readonly clock: Clock;
  private readonly store: StateStore<TimestampLog>;

  constructor(
    readonly limit: number,
    readonly windowMs: number,
    options: LimiterOptions<TimestampLog> = {}
  ) {
    this.clock = options.clock ?? monotonicClock;
    this.store = options.store ?? new InMemoryStateStore();
  }

  isRequestAllowed(clientId: string): Promise<boolean> {
    return this.store.evaluate(
      clientId,
      () => new TimestampLog(),
      (log) => {
        const now = this.clock.now();
        log.dropThrough(now - this.windowMs);

        if (log.length < this.limit) {
          log.push(now);
          return true;
        }

        return false;
      }
    );
  }

  retryAfter(clientId: string): Promise<number> {
    return this.store.inspect(clientId, (log) => {
      if (this.limit <= 0) return Number.POSITIVE_INFINITY;
      if (!log) return 0;

      const now = this.clock.now();
      log.dropThrough(now - this.windowMs);

      const oldest = log.oldest();
      if (log.length < this.limit || oldest === undefined) {
        return 0;
      }

      return Math.max(0, oldest + this.windowMs - now);
    });
  }
}
