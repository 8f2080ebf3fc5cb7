/**
 * Rate Limiter
 *
 * In-memory fixed-window counters keyed by an arbitrary string (client IP
 * for the OAuth endpoints, user id for tool calls). Single process only.
 */

export interface RateLimitStatus {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Epoch ms at which the current window ends */
  resetAt: number;
  /** 0 when allowed */
  retryAfterSeconds: number;
}

/** Window used by every per-minute bucket */
export const RATE_LIMIT_WINDOW_MS = 60_000;

export class RateLimiter {
  private attempts = new Map<string, { count: number; resetAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Count one attempt against `key` and report whether it fits the window
   *
   * Counters only grow within a window; a rejected attempt is not counted.
   */
  consume(key: string, limit: number, windowMs: number): RateLimitStatus {
    const now = this.now();
    let record = this.attempts.get(key);

    if (!record || now >= record.resetAt) {
      record = { count: 0, resetAt: now + windowMs };
      this.attempts.set(key, record);
    }

    if (record.count >= limit) {
      return {
        allowed: false,
        limit,
        remaining: 0,
        resetAt: record.resetAt,
        retryAfterSeconds: Math.max(1, Math.ceil((record.resetAt - now) / 1000)),
      };
    }

    record.count++;
    return {
      allowed: true,
      limit,
      remaining: limit - record.count,
      resetAt: record.resetAt,
      retryAfterSeconds: 0,
    };
  }

  /**
   * Current attempt count for a key (0 if unknown or expired)
   */
  getCount(key: string): number {
    const record = this.attempts.get(key);
    if (!record || this.now() >= record.resetAt) {
      return 0;
    }
    return record.count;
  }

  /**
   * Drop expired windows. Call periodically to bound memory.
   */
  cleanup(): void {
    const now = this.now();
    for (const [key, record] of this.attempts.entries()) {
      if (now >= record.resetAt) {
        this.attempts.delete(key);
      }
    }
  }

  reset(key: string): void {
    this.attempts.delete(key);
  }
}
