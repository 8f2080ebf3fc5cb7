import { describe, it, expect } from 'vitest';
import { RateLimiter, RATE_LIMIT_WINDOW_MS } from '../../src/services/rate-limiter.js';

function clockAt(start: number) {
  const clock = { now: start };
  return { clock, limiter: new RateLimiter(() => clock.now) };
}

describe('RateLimiter', () => {
  it('should allow up to the limit within one window and report the remainder', () => {
    const { limiter } = clockAt(1_000);

    const first = limiter.consume('token:1.2.3.4', 3, RATE_LIMIT_WINDOW_MS);
    const second = limiter.consume('token:1.2.3.4', 3, RATE_LIMIT_WINDOW_MS);
    const third = limiter.consume('token:1.2.3.4', 3, RATE_LIMIT_WINDOW_MS);

    expect(first).toEqual({ allowed: true, limit: 3, remaining: 2, resetAt: 61_000, retryAfterSeconds: 0 });
    expect(second.remaining).toBe(1);
    expect(third.remaining).toBe(0);
    expect(third.allowed).toBe(true);
  });

  it('should reject the attempt after the limit with a Retry-After until the window ends', () => {
    const { clock, limiter } = clockAt(0);
    limiter.consume('register:ip', 1, 60_000);

    clock.now = 15_500;
    const rejected = limiter.consume('register:ip', 1, 60_000);

    expect(rejected.allowed).toBe(false);
    expect(rejected.remaining).toBe(0);
    expect(rejected.resetAt).toBe(60_000);
    expect(rejected.retryAfterSeconds).toBe(45);
  });

  it('should not count rejected attempts', () => {
    const { limiter } = clockAt(0);
    limiter.consume('k', 1, 60_000);
    limiter.consume('k', 1, 60_000);
    limiter.consume('k', 1, 60_000);

    expect(limiter.getCount('k')).toBe(1);
  });

  it('should start a fresh window once the previous one has ended', () => {
    const { clock, limiter } = clockAt(0);
    limiter.consume('k', 1, 60_000);
    expect(limiter.consume('k', 1, 60_000).allowed).toBe(false);

    clock.now = 60_000;
    const next = limiter.consume('k', 1, 60_000);

    expect(next.allowed).toBe(true);
    expect(next.resetAt).toBe(120_000);
  });

  it('should keep keys independent', () => {
    const { limiter } = clockAt(0);
    limiter.consume('tool:user-a', 1, 60_000);

    expect(limiter.consume('tool:user-b', 1, 60_000).allowed).toBe(true);
    expect(limiter.consume('tool:user-a', 1, 60_000).allowed).toBe(false);
  });

  it('should drop only expired windows on cleanup', () => {
    const { clock, limiter } = clockAt(0);
    limiter.consume('old', 5, 1_000);
    limiter.consume('fresh', 5, 60_000);

    clock.now = 2_000;
    limiter.cleanup();

    expect(limiter.getCount('old')).toBe(0);
    expect(limiter.getCount('fresh')).toBe(1);
  });

  it('should forget a key on reset', () => {
    const { limiter } = clockAt(0);
    limiter.consume('k', 1, 60_000);
    limiter.reset('k');

    expect(limiter.consume('k', 1, 60_000).allowed).toBe(true);
  });
});
