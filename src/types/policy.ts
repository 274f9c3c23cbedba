export type RateLimitAlgorithm =
  | "fixed_window"
  | "sliding_window"
  | "token_bucket"
  | "leaky_bucket";

export interface WindowPolicy {
  algorithm: "fixed_window" | "sliding_window";
  limit: number;      // max requests per window
  windowMs: number;   // window length
}

export interface BucketPolicy {
  algorithm: "token_bucket" | "leaky_bucket";
  bucketSize: number;    // capacity (tokens or queued units)
  ratePerSecond: number; // refill rate for token bucket, leak rate for leaky bucket
}

export type RateLimitPolicy = WindowPolicy | BucketPolicy;
