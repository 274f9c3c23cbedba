import type { Request } from "express";

export type ClientIdResolver = (req: Request) => string;

/**
 * Determines the strongest possible identifier for rate limiting.
 *
 * Priority:
 * 1. API Key (x-api-key header)
 * 2. Authenticated user ID (req.user)
 * 3. IP address (fallback)
 */
export const getRateLimitKey: ClientIdResolver = (req) => {
  const apiKey = req.header("x-api-key");
  if (apiKey) {
    return `rl:apikey:${apiKey}`;
  }

  // Set by an upstream auth middleware, if there is one
  const userId = authenticatedUserId(req);
  if (userId) {
    return `rl:user:${userId}`;
  }

  return `rl:ip:${req.ip ?? "unknown"}`;
};

function authenticatedUserId(req: Request): string | undefined {
  const user: unknown = Reflect.get(req, "user");
  if (typeof user !== "object" || user === null || !("id" in user)) {
    return undefined;
  }
  const { id } = user;
  if (typeof id === "string" || typeof id === "number") {
    return String(id);
  }
  return undefined;
}
