export interface RateLimitVerdict {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the current window closes. */
  resetSeconds: number;
}

/**
 * Fixed one-second windows per client key. A limit of 0 lets everything
 * through.
 */
export class FixedWindowRateLimiter {
  private windows = new Map<string, { start: number; count: number }>();

  constructor(
    private readonly limitPerSecond: number,
    private readonly windowMs = 1_000
  ) {}

  check(key: string, now = Date.now()): RateLimitVerdict {
    const limit = this.limitPerSecond;
    if (limit <= 0) return { allowed: true, limit, remaining: Infinity, resetSeconds: 0 };

    this.prune(now);
    let window = this.windows.get(key);
    if (!window || now - window.start >= this.windowMs) {
      window = { start: now, count: 0 };
      this.windows.set(key, window);
    }

    const resetSeconds = Math.max(1, Math.ceil((window.start + this.windowMs - now) / 1000));
    if (window.count >= limit) {
      return { allowed: false, limit, remaining: 0, resetSeconds };
    }
    window.count += 1;
    return { allowed: true, limit, remaining: limit - window.count, resetSeconds };
  }

  private prune(now: number) {
    if (this.windows.size < 1024) return;
    for (const [key, window] of this.windows) {
      if (now - window.start >= this.windowMs) this.windows.delete(key);
    }
  }
}
