import { describe, it, expect } from 'vitest';
import { RateLimiter } from './rate-limiter.js';

describe('RateLimiter', () => {
  it('acquires immediately when no slot is reserved', async () => {
    const limiter = new RateLimiter({ intervalMs: 1000 });

    const start = performance.now();
    await limiter.acquire();
    const elapsed = performance.now() - start;

    expect(elapsed).toBeLessThan(50);
  });

  it('spaces sequential calls by the interval', async () => {
    const limiter = new RateLimiter({ intervalMs: 100 });

    const start = performance.now();
    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();
    const elapsed = performance.now() - start;

    expect(elapsed).toBeGreaterThanOrEqual(190);
  });

  it('spaces concurrent callers one interval apart', async () => {
    const limiter = new RateLimiter({ intervalMs: 150 });

    const timestamps: number[] = [];
    await Promise.all(
      Array.from({ length: 3 }, async () => {
        await limiter.acquire();
        timestamps.push(performance.now());
      }),
    );

    timestamps.sort((a, b) => a - b);
    for (let index = 1; index < timestamps.length; index++) {
      const gap = timestamps[index]! - timestamps[index - 1]!;
      expect(gap).toBeGreaterThanOrEqual(140);
    }
  });

  it('zero interval never waits', async () => {
    const limiter = new RateLimiter({ intervalMs: 0 });

    const start = performance.now();
    for (let index = 0; index < 5; index++) {
      await limiter.acquire();
    }

    expect(performance.now() - start).toBeLessThan(50);
  });
});
