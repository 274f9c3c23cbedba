import type { RateLimitAlgorithm } from "../types/policy";
import type { Clock } from "../utils/clock";
import type { StateStore } from "./stateStore";

export interface RateLimiter {
  readonly algorithm: RateLimitAlgorithm;

  /**
   * Decide whether `clientId` may proceed now. An allowed request consumes
   * one unit of capacity as part of the same decision.
   */
  isRequestAllowed(clientId: string): Promise<boolean>;

  /**
   * Milliseconds until the next request from `clientId` is guaranteed
   * capacity. 0 means it would be allowed now; Infinity means capacity
   * never frees up under the current parameters.
   */
  retryAfter(clientId: string): Promise<number>;
}

export interface LimiterOptions<TState> {
  clock?: Clock;
  store?: StateStore<TState>;
}

// Guard against a clock reading that goes backwards.
export function elapsedSince(since: number, now: number): number {
  return Math.max(0, now - since);
}
