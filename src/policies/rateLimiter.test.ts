import { describe, expect, it } from 'vitest';

import { RateLimiter } from './rateLimiter.js';

const makeClock = (start = 0) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
};

describe('RateLimiter', () => {
  it('allows up to maxEvents inside the window', () => {
    const clock = makeClock(1_000);
    const limiter = new RateLimiter({ maxEvents: 2, now: clock.now });

    expect(limiter.consume('chat').remaining).toBe(1);
    expect(limiter.consume('chat').remaining).toBe(0);

    const blocked = limiter.consume('chat');
    expect(blocked.allowed).toBe(false);
    expect(blocked.resetAt.getTime()).toBe(61_000);
  });

  it('rolls the window forward', () => {
    const clock = makeClock();
    const limiter = new RateLimiter({ maxEvents: 1, now: clock.now });

    expect(limiter.consume('chat').allowed).toBe(true);
    clock.advance(59_999);
    expect(limiter.consume('chat').allowed).toBe(false);
    clock.advance(1);
    expect(limiter.consume('chat').allowed).toBe(true);
  });

  it('tracks keys independently', () => {
    const limiter = new RateLimiter({ maxEvents: 1, now: () => 0 });

    expect(limiter.consume('a').allowed).toBe(true);
    expect(limiter.consume('b').allowed).toBe(true);
    expect(limiter.consume('a').allowed).toBe(false);
  });

  it('is disabled with maxEvents 0', () => {
    const limiter = new RateLimiter({ maxEvents: 0 });

    for (let i = 0; i < 100; i += 1) {
      expect(limiter.consume('chat').allowed).toBe(true);
    }
    expect(limiter.enabled).toBe(false);
    expect(limiter.trackedKeys).toBe(0);
  });

  it('prunes idle keys', () => {
    const clock = makeClock();
    const limiter = new RateLimiter({ maxEvents: 5, now: clock.now });

    limiter.consume('a');
    clock.advance(30_000);
    limiter.consume('b');
    clock.advance(30_000);
    limiter.prune();

    expect(limiter.trackedKeys).toBe(1);
  });

  it('drops idle keys on its own once a window has passed', () => {
    const clock = makeClock();
    const limiter = new RateLimiter({ maxEvents: 5, now: clock.now });

    for (let i = 0; i < 50; i += 1) {
      limiter.consume(`chat-${i}`);
    }
    expect(limiter.trackedKeys).toBe(50);

    clock.advance(60_000);
    limiter.consume('fresh');

    expect(limiter.trackedKeys).toBe(1);
  });
});
