import { describe, it, expect } from "vitest";
import { MAX_TRACKED_KEYS, RateLimiter } from "../src/http/rateLimit.js";

describe("RateLimiter", () => {
  it("should allow a burst then refuse", () => {
    const limiter = new RateLimiter(60, 2);

    expect(limiter.check("10.0.0.1", 0)).toEqual({ allowed: true });
    expect(limiter.check("10.0.0.1", 0)).toEqual({ allowed: true });
    expect(limiter.check("10.0.0.1", 0)).toEqual({ allowed: false, retryAfterSeconds: 1 });
  });

  it("should refill over time", () => {
    const limiter = new RateLimiter(60, 2);
    limiter.check("10.0.0.1", 0);
    limiter.check("10.0.0.1", 0);

    expect(limiter.check("10.0.0.1", 500).allowed).toBe(false);
    expect(limiter.check("10.0.0.1", 1000)).toEqual({ allowed: true });
  });

  it("should never hold more than the burst", () => {
    const limiter = new RateLimiter(60, 2);
    limiter.check("10.0.0.1", 0);

    expect(limiter.check("10.0.0.1", 1_000_000).allowed).toBe(true);
    expect(limiter.check("10.0.0.1", 1_000_000).allowed).toBe(true);
    expect(limiter.check("10.0.0.1", 1_000_000).allowed).toBe(false);
  });

  it("should round the retry hint up to whole seconds", () => {
    const limiter = new RateLimiter(30, 1);
    limiter.check("10.0.0.1", 0);

    // A quarter token back after 500ms; the rest takes 1.5s more.
    expect(limiter.check("10.0.0.1", 500)).toEqual({ allowed: false, retryAfterSeconds: 2 });
  });

  it("should track clients independently", () => {
    const limiter = new RateLimiter(60, 1);

    expect(limiter.check("10.0.0.1", 0).allowed).toBe(true);
    expect(limiter.check("10.0.0.1", 0).allowed).toBe(false);
    expect(limiter.check("10.0.0.2", 0).allowed).toBe(true);
  });

  it("should forget all clients once too many are tracked", () => {
    const limiter = new RateLimiter(60, 1);
    for (let i = 0; i < MAX_TRACKED_KEYS; i++) {
      limiter.check(`client-${i}`, 0);
    }
    expect(limiter.trackedKeys()).toBe(MAX_TRACKED_KEYS);

    limiter.check("newcomer", 0);
    expect(limiter.trackedKeys()).toBe(1);
    expect(limiter.check("client-0", 0).allowed).toBe(true);
  });

  it("should reject non-positive limits", () => {
    expect(() => new RateLimiter(0, 5)).toThrow(RangeError);
    expect(() => new RateLimiter(60, 0)).toThrow(RangeError);
  });
});
