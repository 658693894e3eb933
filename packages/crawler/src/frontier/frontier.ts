import type {
  CrawlTask,
  DequeueOptions,
  FrontierEntry,
  TaskState,
} from './types.js';

type Waiter = (task: CrawlTask | undefined) => void;

/**
 * FIFO work queue of crawl tasks that also owns the crawl's dedup state:
 * every address ever enqueued (never re-enqueued) and every address marked
 * visited (never unmarked).
 *
 * All check-then-mark operations are synchronous, so concurrent workers on
 * the event loop cannot interleave between the check and the mark.
 */
export class Frontier {
  private readonly entries: Map<string, FrontierEntry>;
  private readonly queue: string[];
  private head: number;
  private readonly visited: Set<string>;
  private readonly waiters: Waiter[];
  private readonly idleListeners: Array<() => void>;
  private inProgress: number;

  constructor() {
    this.entries = new Map();
    this.queue = [];
    this.head = 0;
    this.visited = new Set();
    this.waiters = [];
    this.idleListeners = [];
    this.inProgress = 0;
  }

  /** Returns false when the address was enqueued before. */
  enqueue(url: string, depth: number): boolean {
    if (this.entries.has(url)) {
      return false;
    }

    const entry: FrontierEntry = {
      task: { url, depth },
      state: 'pending',
    };
    this.entries.set(url, entry);

    const waiter = this.waiters.shift();
    if (waiter) {
      entry.state = 'in-progress';
      this.inProgress += 1;
      waiter(entry.task);
      return true;
    }

    this.queue.push(url);
    return true;
  }

  /**
   * Next pending task, waiting at most `timeoutMs`. Resolves undefined on
   * timeout, on abort, or as soon as the frontier turns idle.
   */
  dequeue(options: DequeueOptions): Promise<CrawlTask | undefined> {
    const task = this.takeNext();
    if (task || options.signal?.aborted || this.isIdle()) {
      return Promise.resolve(task);
    }

    return new Promise((resolve) => {
      const settle = (value: CrawlTask | undefined): void => {
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        resolve(value);
      };

      const withdraw = (): void => {
        const index = this.waiters.indexOf(settle);
        if (index !== -1) {
          this.waiters.splice(index, 1);
          settle(undefined);
        }
      };

      const onAbort = (): void => withdraw();
      const timer = setTimeout(withdraw, options.timeoutMs);
      options.signal?.addEventListener('abort', onAbort, { once: true });

      this.waiters.push(settle);
    });
  }

  /** Accounts for a dequeued task, whether it was processed or discarded. */
  complete(task: CrawlTask): void {
    const entry = this.entries.get(task.url);
    if (!entry || entry.state !== 'in-progress') {
      return;
    }

    entry.state = 'done';
    this.inProgress -= 1;

    if (this.isIdle()) {
      this.notifyIdle();
    }
  }

  /** Returns false when the address was already visited. */
  markVisited(url: string): boolean {
    if (this.visited.has(url)) {
      return false;
    }

    this.visited.add(url);
    return true;
  }

  isVisited(url: string): boolean {
    return this.visited.has(url);
  }

  isEnqueued(url: string): boolean {
    return this.entries.has(url);
  }

  isIdle(): boolean {
    return this.pendingCount === 0 && this.inProgress === 0;
  }

  /** Resolves once nothing is pending and nothing is in progress. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleListeners.push(resolve);
    });
  }

  size(state?: TaskState): number {
    if (!state) {
      return this.entries.size;
    }

    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.state === state) {
        count += 1;
      }
    }
    return count;
  }

  get pendingCount(): number {
    return this.queue.length - this.head;
  }

  get inFlightCount(): number {
    return this.inProgress;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  private takeNext(): CrawlTask | undefined {
    while (this.head < this.queue.length) {
      const url = this.queue[this.head];
      this.head += 1;

      const entry = url === undefined ? undefined : this.entries.get(url);
      if (entry?.state === 'pending') {
        entry.state = 'in-progress';
        this.inProgress += 1;
        this.compact();
        return entry.task;
      }
    }

    return undefined;
  }

  private compact(): void {
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }
  }

  private notifyIdle(): void {
    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      waiter(undefined);
    }

    const listeners = this.idleListeners.splice(0);
    for (const listener of listeners) {
      listener();
    }
  }
}
