/**
 * Fixed-window rate limiter
 *
 * Counts requests per client key in one-minute windows. State is per process,
 * so each serverless instance limits independently.
 */

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the current window closes */
  retryAfterSeconds: number;
}

interface WindowEntry {
  windowStart: number;
  count: number;
}

export interface RateLimiterOptions {
  limit: number;
  /** @default 60000 */
  windowMs?: number;
  now?: () => number;
  /**
   * Keys tracked at once. Expired windows are swept first, then the
   * oldest keys are evicted.
   */
  maxEntries?: number;
}

export class FixedWindowRateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly maxEntries: number;
  private readonly windows: Map<string, WindowEntry> = new Map();

  constructor(options: RateLimiterOptions) {
    this.limit = options.limit;
    this.windowMs = options.windowMs ?? 60_000;
    this.now = options.now ?? Date.now;
    this.maxEntries = options.maxEntries ?? 10_000;
  }

  /**
   * Count one request for `key` and decide whether it may proceed.
   */
  consume(key: string): RateLimitDecision {
    const now = this.now();
    const windowStart = now - (now % this.windowMs);
    let entry = this.windows.get(key);

    if (!entry || entry.windowStart !== windowStart) {
      if (this.windows.size >= this.maxEntries) {
        this.sweep(windowStart);
      }
      entry = { windowStart, count: 0 };
      this.windows.set(key, entry);
    }

    const retryAfterSeconds = Math.ceil((windowStart + this.windowMs - now) / 1000);

    if (entry.count >= this.limit) {
      return { allowed: false, limit: this.limit, remaining: 0, retryAfterSeconds };
    }

    entry.count++;
    return {
      allowed: true,
      limit: this.limit,
      remaining: this.limit - entry.count,
      retryAfterSeconds,
    };
  }

  reset(): void {
    this.windows.clear();
  }

  private sweep(currentWindowStart: number): void {
    for (const [key, entry] of this.windows) {
      if (entry.windowStart !== currentWindowStart) {
        this.windows.delete(key);
      }
    }

    // Map iteration follows insertion order, so the first keys are the oldest.
    for (const key of this.windows.keys()) {
      if (this.windows.size < this.maxEntries) {
        break;
      }
      this.windows.delete(key);
    }
  }
}
