import type { LimiterOptions, RateLimiter } from "./rateLimiter";
import { InMemoryStateStore, type StateStore } from "./stateStore";
import { type Clock, monotonicClock } from "../utils/clock";

export interface FixedWindowState {
  windowStart: number;
  count: number;
}

/**
 * Counts requests in non-overlapping windows that open on a client's first
 * request after the previous window ended.
 *
 * A burst straddling a boundary can see up to 2 × limit admissions in a
 * short span.
 */
export class FixedWindowLimiter implements RateLimiter {
  readonly algorithm = "fixed_window";

  private readonly clock: Clock;
  private readonly store: StateStore<FixedWindowState>;

  constructor(
    readonly limit: number,
    readonly windowMs: number,
    options: LimiterOptions<FixedWindowState> = {}
  ) {
    this.clock = options.clock ?? monotonicClock;
    this.store = options.store ?? new InMemoryStateStore();
  }

  isRequestAllowed(clientId: string): Promise<boolean> {
    return this.store.evaluate(
      clientId,
      () => ({ windowStart: this.clock.now(), count: 0 }),
      (state) => {
        const now = this.clock.now();

        if (now - state.windowStart >= this.windowMs) {
          state.windowStart = now;
          state.count = 0;
        }

        if (state.count < this.limit) {
          state.count += 1;
          return true;
        }

        return false;
      }
    );
  }

  retryAfter(clientId: string): Promise<number> {
    return this.store.inspect(clientId, (state) => {
      if (this.limit <= 0) return Number.POSITIVE_INFINITY;
      if (!state) return 0;

      const now = this.clock.now();
      const windowEnd = state.windowStart + this.windowMs;

      if (now >= windowEnd || state.count < this.limit) {
        return 0;
      }

      return windowEnd - now;
    });
  }
}
