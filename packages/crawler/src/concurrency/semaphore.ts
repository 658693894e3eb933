/**
 * Counting semaphore. Waiters are resumed in FIFO order; a released permit
 * is handed directly to the oldest waiter.
 */
export class Semaphore {
  private readonly capacity: number;
  private available: number;
  private readonly waiters: Array<() => void>;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Semaphore capacity must be a positive integer, got ${capacity}`,
      );
    }

    this.capacity = capacity;
    this.available = capacity;
    this.waiters = [];
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available -= 1;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter();
      return;
    }

    if (this.available >= this.capacity) {
      throw new Error('Semaphore released more times than acquired');
    }

    this.available += 1;
  }

  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get pendingCount(): number {
    return this.waiters.length;
  }
}
