export type { RateLimiter, LimiterOptions } from "./limiter/rateLimiter";
export type { StateStore } from "./limiter/stateStore";
export { InMemoryStateStore } from "./limiter/stateStore";
export { Mutex } from "./limiter/mutex";
export { FixedWindowLimiter } from "./limiter/fixedWindow";
export type { FixedWindowState } from "./limiter/fixedWindow";
export { SlidingWindowLimiter, TimestampLog } from "./limiter/slidingWindow";
export { TokenBucketLimiter } from "./limiter/tokenBucket";
export type { TokenBucketState } from "./limiter/tokenBucket";
export { LeakyBucketLimiter } from "./limiter/leakyBucket";
export type { LeakyBucketState } from "./limiter/leakyBucket";
export { createLimiter } from "./limiter/limiterFactory";
export type { CreateLimiterOptions } from "./limiter/limiterFactory";
export { rateLimit, decide, retryAfterSeconds } from "./middleware/rateLimit.middleware";
export type { RateLimitOptions } from "./middleware/rateLimit.middleware";
export { getRateLimitKey } from "./utils/identifier";
export type { ClientIdResolver } from "./utils/identifier";
export type { Clock } from "./utils/clock";
export { ManualClock, monotonicClock } from "./utils/clock";
export type { RateLimitPolicy, RateLimitAlgorithm, WindowPolicy, BucketPolicy } from "./types/policy";
export type { RateLimitDecision } from "./types/decision";
export { createApp } from "./app";
export type { AppOptions } from "./app";
