import express, { type RequestHandler } from "express";
import type { Logger } from "pino";
import { policyFromConfig, type Config } from "./config";
import { createLimiter } from "./limiter/limiterFactory";
import type { RateLimiter } from "./limiter/rateLimiter";
import { decide, rateLimit, retryAfterSeconds } from "./middleware/rateLimit.middleware";
import { getRateLimitKey } from "./utils/identifier";
import { createLogger } from "./utils/logger";
import { getMetrics, recordAllowed, recordBlocked } from "./utils/metrics";

export interface AppOptions {
  config: Config;
  /** Defaults to a limiter built from the config's policy */
  limiter?: RateLimiter;
  /** Defaults to a logger built from the config's logging settings */
  logger?: Logger;
}

export function createApp({ config, limiter: provided, logger }: AppOptions) {
  const limiter = provided ?? createLimiter(policyFromConfig(config));
  const limited = rateLimit(limiter, {
    resolveClientId: getRateLimitKey,
    failureMode: config.rateLimitFailureMode,
    logger: logger ?? createLogger(config),
  });

  const app = express();
  app.use(express.json());

  app.set("trust proxy", config.trustProxy);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/metrics", (_req, res) => {
    res.json(getMetrics());
  });

  // Calling the limiter directly instead of through the middleware
  app.get("/api/manual", async (req, res, next) => {
    try {
      const decision = await decide(limiter, getRateLimitKey(req));

      if (!decision.allowed) {
        recordBlocked();
        const seconds = retryAfterSeconds(decision.retryAfterMs);
        if (seconds !== null) {
          res.setHeader("Retry-After", String(seconds));
        }
        res.status(429).json({ message: "Too many requests (manual)" });
        return;
      }

      recordAllowed();
      res.json({ message: "Manual rate-limited response" });
    } catch (err) {
      next(err);
    }
  });

  const limitedRoute: RequestHandler = (_req, res) => {
    res.json({ message: "Request successful" });
  };

  if (config.rateLimitGlobal) {
    // Everything registered after this point shares the limit
    app.use(limited);
    app.get("/api/limited", limitedRoute);
  } else {
    app.get("/api/limited", limited, limitedRoute);
  }

  return app;
}
