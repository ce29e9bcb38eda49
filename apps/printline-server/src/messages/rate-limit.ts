/** Simple sliding-window rate limiter */
export class RateLimiter {
  private timestamps: number[] = [];

  constructor(
    private maxRequests: number,
    private windowMs: number
  ) {}

  /** Returns true if the request is allowed */
  check(now = Date.now()): boolean {
    this.timestamps = this.timestamps.filter((t) => now - t < this.windowMs);

    if (this.timestamps.length >= this.maxRequests) {
      return false;
    }

    this.timestamps.push(now);
    return true;
  }

  /** True once every recorded request has left the window */
  isIdle(now = Date.now()): boolean {
    return this.timestamps.every((t) => now - t >= this.windowMs);
  }
}

/** One sliding window per client key (the remote address for HTTP submits) */
export class KeyedRateLimiter {
  private limiters = new Map<string, RateLimiter>();

  constructor(
    private maxRequests: number,
    private windowMs: number
  ) {}

  check(key: string, now = Date.now()): boolean {
    if (this.maxRequests <= 0) return true;

    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = new RateLimiter(this.maxRequests, this.windowMs);
      this.limiters.set(key, limiter);
    }
    return limiter.check(now);
  }

  /** Drop windows with no recent requests so the map does not grow forever */
  sweep(now = Date.now()): void {
    for (const [key, limiter] of this.limiters) {
      if (limiter.isIdle(now)) this.limiters.delete(key);
    }
  }
}
