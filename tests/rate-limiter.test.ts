import { describe, it, expect } from 'vitest';
import { RateLimiter } from '../src/rate-limit/index.js';

function clock(start: number) {
  const state = { now: start };
  return { state, now: () => state.now };
}

describe('RateLimiter', () => {
  it('admits up to maxRequests within the window', () => {
    const c = clock(1000);
    const limiter = new RateLimiter({ maxRequests: 3, windowSeconds: 60, now: c.now });

    const results: boolean[] = [];
    for (const t of [1000, 1200, 1400, 1600]) {
      c.state.now = t;
      results.push(limiter.checkAndRecord('s1'));
    }

    expect(results).toEqual([true, true, true, false]);
  });

  it('admits a rejected session again once the window has elapsed', () => {
    const c = clock(0);
    const limiter = new RateLimiter({ maxRequests: 3, windowSeconds: 60, now: c.now });

    for (let i = 0; i < 3; i++) limiter.checkAndRecord('s1');
    expect(limiter.checkAndRecord('s1')).toBe(false);

    c.state.now = 60_000;
    expect(limiter.checkAndRecord('s1')).toBe(true);
    expect(limiter.remaining('s1')).toBe(2);
  });

  it('treats a timestamp exactly one window old as expired', () => {
    const c = clock(0);
    const limiter = new RateLimiter({ maxRequests: 1, windowSeconds: 60, now: c.now });

    expect(limiter.checkAndRecord('s1')).toBe(true);
    c.state.now = 59_999;
    expect(limiter.checkAndRecord('s1')).toBe(false);
    c.state.now = 60_000;
    expect(limiter.checkAndRecord('s1')).toBe(true);
  });

  it('does not record rejected attempts', () => {
    const c = clock(0);
    const limiter = new RateLimiter({ maxRequests: 2, windowSeconds: 60, now: c.now });

    limiter.checkAndRecord('s1');
    c.state.now = 10;
    limiter.checkAndRecord('s1');
    c.state.now = 20;
    expect(limiter.checkAndRecord('s1')).toBe(false);

    // Only the admission at t=0 has expired; the rejected one at t=20 was never counted
    c.state.now = 60_005;
    expect(limiter.checkAndRecord('s1')).toBe(true);
    c.state.now = 60_006;
    expect(limiter.checkAndRecord('s1')).toBe(false);
  });

  it('keeps sessions isolated', () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowSeconds: 60, now: () => 0 });

    expect(limiter.checkAndRecord('a')).toBe(true);
    expect(limiter.checkAndRecord('a')).toBe(false);
    expect(limiter.checkAndRecord('b')).toBe(true);
  });

  it('reports time until the next admission', () => {
    const c = clock(1000);
    const limiter = new RateLimiter({ maxRequests: 1, windowSeconds: 60, now: c.now });

    expect(limiter.retryAfterMs('s1')).toBe(0);
    limiter.checkAndRecord('s1');
    c.state.now = 31_000;
    expect(limiter.retryAfterMs('s1')).toBe(30_000);
  });

  it('uses 20 requests per 60 seconds by default', () => {
    const limiter = new RateLimiter();
    expect(limiter.maxRequests).toBe(20);
    expect(limiter.windowMs).toBe(60_000);
    expect(limiter.remaining('new-session')).toBe(20);
  });

  it('never over-admits concurrent handlers for one session', async () => {
    const limiter = new RateLimiter({ maxRequests: 5, windowSeconds: 60, now: () => 0 });

    const results = await Promise.all(
      Array.from({ length: 10 }, async () => limiter.checkAndRecord('shared'))
    );

    expect(results.filter(Boolean)).toHaveLength(5);
  });

  it('drops windows once every admission has expired', () => {
    const c = clock(0);
    const limiter = new RateLimiter({ maxRequests: 2, windowSeconds: 60, now: c.now });

    limiter.checkAndRecord('a');
    limiter.checkAndRecord('b');
    expect(limiter.trackedSessions).toBe(2);

    c.state.now = 60_000;
    expect(limiter.remaining('a')).toBe(2);
    expect(limiter.trackedSessions).toBe(1);
    expect(limiter.retryAfterMs('b')).toBe(0);
    expect(limiter.trackedSessions).toBe(0);
  });

  it('does not track sessions that were only queried', () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowSeconds: 60, now: () => 0 });

    expect(limiter.remaining('ghost')).toBe(1);
    expect(limiter.trackedSessions).toBe(0);
  });

  it('forgets a session on reset', () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowSeconds: 60, now: () => 0 });
    limiter.checkAndRecord('s1');
    limiter.reset('s1');
    expect(limiter.checkAndRecord('s1')).toBe(true);
  });
});
