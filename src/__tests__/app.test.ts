import { describe, it, expect, beforeEach, afterEach } from "vitest";
import request from "supertest";
import { createApp } from "../app";
import { parseConfig, resetConfig } from "../config";
import { FixedWindowLimiter } from "../limiter/fixedWindow";
import { ManualClock } from "../utils/clock";
import { resetMetrics } from "../utils/metrics";

function fixedWindowApp(limit: number, overrides: Record<string, unknown> = {}) {
  const config = parseConfig({ trustProxy: true, ...overrides });
  const limiter = new FixedWindowLimiter(limit, 60_000, { clock: new ManualClock() });
  return createApp({ config, limiter });
}

describe("app", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetMetrics();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetConfig();
  });

  it("should report health without a limit", async () => {
    const app = fixedWindowApp(0);

    for (let i = 0; i < 3; i++) {
      const res = await request(app).get("/health");
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "ok" });
    }
  });

  it("should limit /api/limited per API key", async () => {
    const app = fixedWindowApp(2);

    for (let i = 0; i < 2; i++) {
      const res = await request(app).get("/api/limited").set("x-api-key", "k1");
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: "Request successful" });
    }

    const denied = await request(app).get("/api/limited").set("x-api-key", "k1");
    expect(denied.status).toBe(429);
    expect(denied.headers["retry-after"]).toBe("60");

    const other = await request(app).get("/api/limited").set("x-api-key", "k2");
    expect(other.status).toBe(200);
  });

  it("should limit /api/manual without the middleware", async () => {
    const app = fixedWindowApp(1);

    const first = await request(app).get("/api/manual").set("x-api-key", "k1");
    expect(first.status).toBe(200);
    expect(first.body).toEqual({ message: "Manual rate-limited response" });

    const second = await request(app).get("/api/manual").set("x-api-key", "k1");
    expect(second.status).toBe(429);
    expect(second.body).toEqual({ message: "Too many requests (manual)" });
    expect(second.headers["retry-after"]).toBe("60");
  });

  it("should share one limiter across routes", async () => {
    const app = fixedWindowApp(1);

    await request(app).get("/api/manual").set("x-api-key", "k1");
    const res = await request(app).get("/api/limited").set("x-api-key", "k1");

    expect(res.status).toBe(429);
  });

  it("should expose admission counters", async () => {
    const app = fixedWindowApp(1);

    await request(app).get("/api/limited").set("x-api-key", "k1");
    await request(app).get("/api/limited").set("x-api-key", "k1");

    const res = await request(app).get("/metrics");
    expect(res.body).toEqual({ allowed: 1, blocked: 1, errors: 0 });
  });

  it("should count each request once when the limit is global", async () => {
    const app = fixedWindowApp(2, { rateLimitGlobal: true });

    const statuses: number[] = [];
    for (let i = 0; i < 3; i++) {
      const res = await request(app).get("/api/limited").set("x-api-key", "k1");
      statuses.push(res.status);
    }

    expect(statuses).toEqual([200, 200, 429]);
  });

  it("should limit unknown routes when the limit is global", async () => {
    const app = fixedWindowApp(1, { rateLimitGlobal: true });

    const first = await request(app).get("/api/missing").set("x-api-key", "k1");
    const second = await request(app).get("/api/missing").set("x-api-key", "k1");

    expect(first.status).toBe(404);
    expect(second.status).toBe(429);
  });

  it("should build its limiter from the config when none is given", async () => {
    const config = parseConfig({
      rateLimitAlgorithm: "leaky_bucket",
      rateLimitBucketSize: 1,
      rateLimitRatePerSec: 0,
    });
    const app = createApp({ config });

    const first = await request(app).get("/api/limited").set("x-api-key", "k1");
    const second = await request(app).get("/api/limited").set("x-api-key", "k1");

    expect(first.status).toBe(200);
    expect(second.status).toBe(429);
    expect(second.headers["retry-after"]).toBeUndefined();
  });

  it("should count manual outcomes", async () => {
    const app = fixedWindowApp(1);

    await request(app).get("/api/manual").set("x-api-key", "k1");
    await request(app).get("/api/manual").set("x-api-key", "k1");

    const res = await request(app).get("/metrics");
    expect(res.body).toEqual({ allowed: 1, blocked: 1, errors: 0 });
  });

  it("should deny with 429 whatever the process environment holds", async () => {
    process.env.PORT = "0";
    process.env.LOG_LEVEL = "verbose";
    resetConfig();
    const app = fixedWindowApp(0);

    const res = await request(app).get("/api/limited").set("x-api-key", "k1");

    expect(res.status).toBe(429);
    expect(res.body).toEqual({ message: "Too many requests" });
  });
});
