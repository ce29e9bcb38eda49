import { describe, it, expect } from "vitest";
import { KeyedRateLimiter, RateLimiter } from "../src/messages/rate-limit.js";

describe("RateLimiter", () => {
  it("allows up to the limit inside the window", () => {
    const limiter = new RateLimiter(2, 1_000);
    expect(limiter.check(0)).toBe(true);
    expect(limiter.check(100)).toBe(true);
    expect(limiter.check(200)).toBe(false);
  });

  it("frees a slot once the oldest request leaves the window", () => {
    const limiter = new RateLimiter(2, 1_000);
    limiter.check(0);
    limiter.check(500);
    expect(limiter.check(999)).toBe(false);
    expect(limiter.check(1_000)).toBe(true);
  });
});

describe("KeyedRateLimiter", () => {
  it("keeps a separate window per key", () => {
    const limiter = new KeyedRateLimiter(1, 1_000);
    expect(limiter.check("10.0.0.1", 0)).toBe(true);
    expect(limiter.check("10.0.0.1", 10)).toBe(false);
    expect(limiter.check("10.0.0.2", 10)).toBe(true);
  });

  it("never limits when the maximum is zero", () => {
    const limiter = new KeyedRateLimiter(0, 1_000);
    for (let i = 0; i < 50; i++) {
      expect(limiter.check("10.0.0.1", i)).toBe(true);
    }
  });

  it("keeps windows that are still active when sweeping", () => {
    const limiter = new KeyedRateLimiter(1, 1_000);
    limiter.check("a", 0);
    limiter.check("b", 900);
    limiter.sweep(1_500);
    expect(limiter.check("a", 1_500)).toBe(true);
    expect(limiter.check("b", 1_500)).toBe(false);
  });
});
