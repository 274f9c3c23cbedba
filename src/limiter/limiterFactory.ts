import type { RateLimiter } from "./rateLimiter";
import { FixedWindowLimiter } from "./fixedWindow";
import { SlidingWindowLimiter } from "./slidingWindow";
import { TokenBucketLimiter } from "./tokenBucket";
import { LeakyBucketLimiter } from "./leakyBucket";
import type { RateLimitPolicy } from "../types/policy";
import type { Clock } from "../utils/clock";

export interface CreateLimiterOptions {
  clock?: Clock;
}

/**
 * Build a limiter for `policy`. Every call returns a new instance with its
 * own client state; share the instance to share the limit.
 */
export function createLimiter(
  policy: RateLimitPolicy,
  options: CreateLimiterOptions = {}
): RateLimiter {
  const { clock } = options;

  switch (policy.algorithm) {
    case "fixed_window":
      return new FixedWindowLimiter(policy.limit, policy.windowMs, { clock });
    case "sliding_window":
      return new SlidingWindowLimiter(policy.limit, policy.windowMs, { clock });
    case "token_bucket":
      return new TokenBucketLimiter(policy.ratePerSecond, policy.bucketSize, {
        clock,
      });
    case "leaky_bucket":
      return new LeakyBucketLimiter(policy.ratePerSecond, policy.bucketSize, {
        clock,
      });
    default:
      return unsupported(policy);
  }
}

function unsupported(policy: never): never {
  const value: unknown = policy;
  const algorithm =
    typeof value === "object" && value !== null && "algorithm" in value
      ? value.algorithm
      : value;
  throw new Error(`Unsupported rate limit algorithm: ${String(algorithm)}`);
}
