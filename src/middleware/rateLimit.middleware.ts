import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import type { RateLimiter } from "../limiter/rateLimiter";
import type { FailureMode } from "../config";
import type { RateLimitDecision } from "../types/decision";
import { getRateLimitKey, type ClientIdResolver } from "../utils/identifier";
import { getLogger } from "../utils/logger";
import { recordAllowed, recordBlocked, recordError } from "../utils/metrics";

export interface RateLimitOptions {
  resolveClientId?: ClientIdResolver;
  /** What to do when resolving the client or deciding throws */
  failureMode?: FailureMode;
  /** Defaults to the global logger */
  logger?: Logger;
}

/**
 * Ask `limiter` about `clientId`. The wait is only computed on denial.
 */
export async function decide(
  limiter: RateLimiter,
  clientId: string
): Promise<RateLimitDecision> {
  if (await limiter.isRequestAllowed(clientId)) {
    return { allowed: true, retryAfterMs: 0 };
  }
  return { allowed: false, retryAfterMs: await limiter.retryAfter(clientId) };
}

/**
 * Retry-After value in whole seconds, or null when no header should be
 * sent (no wait, or a wait that never ends).
 */
export function retryAfterSeconds(retryAfterMs: number): number | null {
  if (!Number.isFinite(retryAfterMs) || retryAfterMs <= 0) {
    return null;
  }
  return Math.ceil(retryAfterMs / 1000);
}

export function rateLimit(limiter: RateLimiter, options: RateLimitOptions = {}) {
  const resolveClientId = options.resolveClientId ?? getRateLimitKey;
  const failureMode = options.failureMode ?? "fail-open";
  const logger = options.logger ?? getLogger();

  const handle = async (req: Request, res: Response, next: NextFunction) => {
    let decision: RateLimitDecision;
    let clientId: string;

    try {
      clientId = resolveClientId(req);
      decision = await decide(limiter, clientId);
    } catch (err) {
      recordError();
      logger.error(
        { err, algorithm: limiter.algorithm, failureMode },
        "Rate limiter failure"
      );

      if (failureMode === "fail-closed") {
        res.status(503).json({ message: "Rate limiting unavailable" });
        return;
      }

      next();
      return;
    }

    if (!decision.allowed) {
      recordBlocked();
      logger.debug(
        {
          clientId,
          algorithm: limiter.algorithm,
          retryAfterMs: decision.retryAfterMs,
        },
        "Request rate limited"
      );

      const seconds = retryAfterSeconds(decision.retryAfterMs);
      if (seconds !== null) {
        res.setHeader("Retry-After", String(seconds));
      }
      res.status(429).json({ message: "Too many requests" });
      return;
    }

    recordAllowed();
    next();
  };

  // Express 4 does not await handlers; route anything thrown to its error handler.
  return (req: Request, res: Response, next: NextFunction) => {
    handle(req, res, next).catch(next);
  };
}
