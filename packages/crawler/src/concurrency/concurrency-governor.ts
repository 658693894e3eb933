import { originOf } from '../utils/url.js';
import { RateLimiter } from './rate-limiter.js';
import { Semaphore } from './semaphore.js';

type ConcurrencyGovernorConfig = {
  globalLimit: number;
  perOriginLimit: number;
};

type AcquireOptions = {
  /** Minimum spacing between fetch starts on this origin. */
  minIntervalMs?: number;
};

type PermitToken = {
  readonly url: string;
  readonly origin: string;
};

/**
 * Two-level permit system: a task holds one global permit and one permit of
 * its origin while it fetches. Acquired global-first, released in reverse.
 */
export class ConcurrencyGovernor {
  private readonly global: Semaphore;
  private readonly perOriginLimit: number;
  private readonly origins: Map<string, Semaphore>;
  private readonly pacers: Map<string, RateLimiter>;
  private readonly outstanding: Set<PermitToken>;

  constructor(config: ConcurrencyGovernorConfig) {
    this.global = new Semaphore(config.globalLimit);
    this.perOriginLimit = config.perOriginLimit;
    this.origins = new Map();
    this.pacers = new Map();
    this.outstanding = new Set();
  }

  async acquire(url: string, options?: AcquireOptions): Promise<PermitToken> {
    const origin = originOf(url);
    const originPermits = this.originSemaphore(origin);

    await this.global.acquire();
    await originPermits.acquire();

    const token: PermitToken = { url, origin };
    this.outstanding.add(token);

    const minIntervalMs = options?.minIntervalMs ?? 0;
    if (minIntervalMs > 0) {
      await this.pacer(origin, minIntervalMs).acquire();
    }

    return token;
  }

  release(token: PermitToken): void {
    if (!this.outstanding.delete(token)) {
      throw new Error(`Permit for ${token.url} was already released`);
    }

    this.originSemaphore(token.origin).release();
    this.global.release();
  }

  async run<T>(
    url: string,
    task: () => Promise<T>,
    options?: AcquireOptions,
  ): Promise<T> {
    const token = await this.acquire(url, options);
    try {
      return await task();
    } finally {
      this.release(token);
    }
  }

  get inFlight(): number {
    return this.outstanding.size;
  }

  get originCount(): number {
    return this.origins.size;
  }

  /** Tasks queued for a global permit. */
  get waiting(): number {
    return this.global.pendingCount;
  }

  private originSemaphore(origin: string): Semaphore {
    let semaphore = this.origins.get(origin);
    if (!semaphore) {
      semaphore = new Semaphore(this.perOriginLimit);
      this.origins.set(origin, semaphore);
    }
    return semaphore;
  }

  // The first interval seen for an origin sticks for the crawl.
  private pacer(origin: string, intervalMs: number): RateLimiter {
    let limiter = this.pacers.get(origin);
    if (!limiter) {
      limiter = new RateLimiter({ intervalMs });
      this.pacers.set(origin, limiter);
    }
    return limiter;
  }
}

export type { AcquireOptions, ConcurrencyGovernorConfig, PermitToken };
