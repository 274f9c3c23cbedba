import { describe, it, expect, beforeEach } from "vitest";
import { LeakyBucketLimiter } from "../limiter/leakyBucket";
import { ManualClock } from "../utils/clock";

describe("LeakyBucketLimiter", () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
  });

  it("should stay full forever when nothing leaks", async () => {
    const limiter = new LeakyBucketLimiter(0, 1, { clock });

    expect(await limiter.isRequestAllowed("user-a")).toBe(true);
    expect(await limiter.isRequestAllowed("user-a")).toBe(false);

    clock.advance(1e9);

    expect(await limiter.isRequestAllowed("user-a")).toBe(false);
    expect(await limiter.retryAfter("user-a")).toBe(Number.POSITIVE_INFINITY);
  });

  it("should empty within one window when the rate drains it", async () => {
    // bucketSize 1 over a 100 ms window
    const limiter = new LeakyBucketLimiter(10, 1, { clock });

    expect(await limiter.isRequestAllowed("user-a")).toBe(true);

    clock.advance(110);

    expect(await limiter.isRequestAllowed("user-a")).toBe(true);
  });

  it("should admit new traffic after a partial leak", async () => {
    const limiter = new LeakyBucketLimiter(2, 3, { clock });
    for (let i = 0; i < 3; i++) {
      expect(await limiter.isRequestAllowed("user-a")).toBe(true);
    }
    expect(await limiter.isRequestAllowed("user-a")).toBe(false);

    // 1.2 units leak out, leaving 1.8 queued
    clock.advance(600);

    expect(await limiter.isRequestAllowed("user-a")).toBe(true); // 2.8
    expect(await limiter.isRequestAllowed("user-a")).toBe(true); // 3.8
    expect(await limiter.isRequestAllowed("user-a")).toBe(false);
  });

  it("should report the time until a slot frees up", async () => {
    const limiter = new LeakyBucketLimiter(2, 1, { clock });
    await limiter.isRequestAllowed("user-a");

    expect(await limiter.retryAfter("user-a")).toBe(500);

    clock.advance(600);
    expect(await limiter.retryAfter("user-a")).toBe(0);
  });

  it("should not drain below empty after a long idle gap", async () => {
    const limiter = new LeakyBucketLimiter(5, 2, { clock });
    await limiter.isRequestAllowed("user-a");
    await limiter.isRequestAllowed("user-a");

    clock.advance(1e9);

    expect(await limiter.isRequestAllowed("user-a")).toBe(true);
    expect(await limiter.isRequestAllowed("user-a")).toBe(true);
    expect(await limiter.isRequestAllowed("user-a")).toBe(false);
  });

  it("should not leak when the clock goes backwards", async () => {
    const limiter = new LeakyBucketLimiter(10, 1, { clock });
    clock.set(1000);
    await limiter.isRequestAllowed("user-a");

    clock.set(0);

    expect(await limiter.isRequestAllowed("user-a")).toBe(false);
  });
});
