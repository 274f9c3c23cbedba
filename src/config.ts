/**
 * Server configuration
 * Environment variables are validated and typed at startup
 */

import { z } from "zod";
import type { RateLimitPolicy } from "./types/policy";

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return ["true", "1", "yes"].includes(val.toLowerCase());
  });

export const RateLimitAlgorithmSchema = z.enum([
  "fixed_window",
  "sliding_window",
  "token_bucket",
  "leaky_bucket",
]);

export const FailureModeSchema = z.enum(["fail-open", "fail-closed"]);

export type FailureMode = z.infer<typeof FailureModeSchema>;

export const ConfigSchema = z.object({
  // Server
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  host: z.string().default("0.0.0.0"),
  /** Honour X-Forwarded-For when resolving the client IP */
  trustProxy: booleanFlag.default(true),

  // Rate limiting
  rateLimitAlgorithm: RateLimitAlgorithmSchema.default("sliding_window"),
  /** Requests per window (fixed_window, sliding_window) */
  rateLimitLimit: z.coerce.number().int().min(0).default(2),
  rateLimitWindowMs: z.coerce.number().int().min(1).default(60_000),
  /** Capacity (token_bucket, leaky_bucket) */
  rateLimitBucketSize: z.coerce.number().min(0).default(10),
  /** Refill or leak rate per second (token_bucket, leaky_bucket) */
  rateLimitRatePerSec: z.coerce.number().min(0).default(1),
  rateLimitFailureMode: FailureModeSchema.default("fail-open"),
  /** Apply the limiter to every route, not only /api/limited */
  rateLimitGlobal: booleanFlag.default(false),

  // Logging
  logLevel: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  logFormat: z.enum(["json", "pretty"]).default("json"),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Maps environment variable names to config keys
 */
const ENV_MAP: Record<string, keyof z.input<typeof ConfigSchema>> = {
  PORT: "port",
  HOST: "host",
  TRUST_PROXY: "trustProxy",
  RATE_LIMIT_ALGORITHM: "rateLimitAlgorithm",
  RATE_LIMIT_LIMIT: "rateLimitLimit",
  RATE_LIMIT_WINDOW_MS: "rateLimitWindowMs",
  RATE_LIMIT_BUCKET_SIZE: "rateLimitBucketSize",
  RATE_LIMIT_RATE_PER_SEC: "rateLimitRatePerSec",
  RATE_LIMIT_FAILURE_MODE: "rateLimitFailureMode",
  RATE_LIMIT_GLOBAL: "rateLimitGlobal",
  LOG_LEVEL: "logLevel",
  LOG_FORMAT: "logFormat",
};

function loadFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const raw: Record<string, unknown> = {};

  for (const [envKey, configKey] of Object.entries(ENV_MAP)) {
    const value = env[envKey];
    if (value !== undefined) {
      raw[configKey] = value;
    }
  }

  return raw;
}

/**
 * Parse and validate configuration
 * @throws {z.ZodError} if validation fails
 */
export function parseConfig(input: Record<string, unknown> = {}): Config {
  return ConfigSchema.parse(input);
}

/**
 * Load configuration from environment variables
 * @throws {z.ZodError} if validation fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return parseConfig(loadFromEnv(env));
}

/**
 * Load configuration, returning errors instead of throwing
 */
export function loadConfigSafe(
  env: NodeJS.ProcessEnv = process.env
): { config: Config | null; errors: string[] } {
  const result = ConfigSchema.safeParse(loadFromEnv(env));
  if (result.success) {
    return { config: result.data, errors: [] };
  }
  const errors = result.error.issues.map(
    (issue: z.ZodIssue) => `${issue.path.join(".")}: ${issue.message}`
  );
  return { config: null, errors };
}

/**
 * The limiter policy described by `config`
 */
export function policyFromConfig(config: Config): RateLimitPolicy {
  switch (config.rateLimitAlgorithm) {
    case "fixed_window":
    case "sliding_window":
      return {
        algorithm: config.rateLimitAlgorithm,
        limit: config.rateLimitLimit,
        windowMs: config.rateLimitWindowMs,
      };
    case "token_bucket":
    case "leaky_bucket":
      return {
        algorithm: config.rateLimitAlgorithm,
        bucketSize: config.rateLimitBucketSize,
        ratePerSecond: config.rateLimitRatePerSec,
      };
  }
}

let _config: Config | null = null;

/**
 * Get the global config instance (lazy-loaded)
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Reset the global config (mainly for testing)
 */
export function resetConfig(): void {
  _config = null;
}

/**
 * Set the global config (mainly for testing)
 */
export function setConfig(config: Config): void {
  _config = config;
}
