/**
 * Page counter with reservations: a worker reserves a slot before fetching
 * and either commits it (page produced) or releases it. Committed plus
 * reserved never exceeds the limit, so the processed count cannot overshoot
 * even when many workers pass the budget check at once.
 */
export class PageBudget {
  private readonly limit: number;
  private committed: number;
  private reserved: number;
  private settleWaiters: Array<() => void>;

  constructor(limit: number) {
    this.limit = limit;
    this.committed = 0;
    this.reserved = 0;
    this.settleWaiters = [];
  }

  tryReserve(): boolean {
    if (this.committed + this.reserved >= this.limit) {
      return false;
    }

    this.reserved += 1;
    return true;
  }

  commit(): void {
    this.takeReservation();
    this.committed += 1;
    this.notifySettled();
  }

  release(): void {
    this.takeReservation();
    this.notifySettled();
  }

  /**
   * Resolves once an outstanding reservation is committed or released.
   * Resolves at once when nothing is reserved.
   */
  whenSettled(): Promise<void> {
    if (this.reserved === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.settleWaiters.push(resolve);
    });
  }

  /** True once every slot has been used by a processed page. */
  get exhausted(): boolean {
    return this.committed >= this.limit;
  }

  get processed(): number {
    return this.committed;
  }

  private takeReservation(): void {
    if (this.reserved === 0) {
      throw new Error('PageBudget has no outstanding reservation');
    }
    this.reserved -= 1;
  }

  private notifySettled(): void {
    const waiters = this.settleWaiters;
    this.settleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
