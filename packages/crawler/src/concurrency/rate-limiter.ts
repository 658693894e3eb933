type RateLimiterConfig = {
  /** Minimum spacing between two acquisitions. */
  intervalMs: number;
};

/**
 * Spaces acquisitions at least `intervalMs` apart. Each caller reserves the
 * next free slot before sleeping, so concurrent callers queue up one
 * interval after another instead of waking together.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private nextSlotTime: number;

  constructor(config: RateLimiterConfig) {
    this.intervalMs = Math.max(0, config.intervalMs);
    this.nextSlotTime = 0;
  }

  async acquire(): Promise<void> {
    const now = performance.now();
    const slot = Math.max(now, this.nextSlotTime);
    this.nextSlotTime = slot + this.intervalMs;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export type { RateLimiterConfig };
