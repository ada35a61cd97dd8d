interface RateLimitEntry {
  count: number;
  expiresAt: number;
}

export interface RateLimitResult {
  allowed: boolean;
  /** 0 when allowed */
  retryAfterMs: number;
}

/** Fixed-window limiter. Expired windows are swept at most once per window. */
export class RateLimiter {
  private limits = new Map<string, RateLimitEntry>();
  private nextSweepAt = 0;
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(limit: number = 10, windowMs: number = 60000, now: () => number = Date.now) {
    this.limit = limit;
    this.windowMs = windowMs;
    this.now = now;
  }

  /**
   * Consumes one use for `key` if the window still has room.
   */
  hit(key: string): RateLimitResult {
    const now = this.now();
    if (now >= this.nextSweepAt) {
      this.sweep(now);
      this.nextSweepAt = now + this.windowMs;
    }
    const entry = this.limits.get(key);

    if (!entry || now >= entry.expiresAt) {
      this.limits.set(key, { count: 1, expiresAt: now + this.windowMs });
      return { allowed: true, retryAfterMs: 0 };
    }

    if (entry.count >= this.limit) {
      return { allowed: false, retryAfterMs: entry.expiresAt - now };
    }

    entry.count++;
    return { allowed: true, retryAfterMs: 0 };
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.limits.entries()) {
      if (now >= entry.expiresAt) {
        this.limits.delete(key);
      }
    }
  }

  /** Windows currently held */
  get size(): number {
    return this.limits.size;
  }
}
