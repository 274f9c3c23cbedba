export interface RateLimitDecision {
  allowed: boolean;
  retryAfterMs: number; // 0 when allowed; Infinity when capacity never frees
}
