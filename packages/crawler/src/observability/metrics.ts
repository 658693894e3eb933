import type { Logger } from '@workspace/logger';

const COUNTER_NAMES = [
  'pages.processed',
  'pages.failed',
  'tasks.skipped',
  'fetch.failed',
  'render.invoked',
  'render.failed',
  'links.enqueued',
  'images.saved',
  'images.failed',
] as const;

type CounterName = (typeof COUNTER_NAMES)[number];

type GaugeName =
  | 'frontier.pending'
  | 'frontier.inFlight'
  | 'frontier.visited'
  | 'governor.inFlight'
  | 'governor.waiting'
  | 'governor.origins';

type DurationSummary = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type MetricSnapshot = {
  counters: Partial<Record<CounterName, number>>;
  gauges: Partial<Record<GaugeName, number>>;
  /** Fetch durations in milliseconds. */
  fetchDurations: DurationSummary;
};

export class CrawlMetrics {
  private readonly counters: Map<CounterName, number>;
  private readonly gauges: Map<GaugeName, number>;
  // Running totals; individual samples are not kept
  private durationCount: number;
  private durationTotal: number;
  private durationMin: number;
  private durationMax: number;

  constructor() {
    this.counters = new Map();
    this.gauges = new Map();
    this.durationCount = 0;
    this.durationTotal = 0;
    this.durationMin = 0;
    this.durationMax = 0;
  }

  increment(counter: CounterName, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  count(counter: CounterName): number {
    return this.counters.get(counter) ?? 0;
  }

  gauge(name: GaugeName, value: number): void {
    this.gauges.set(name, value);
  }

  recordDuration(ms: number): void {
    this.durationMin = this.durationCount === 0 ? ms : Math.min(this.durationMin, ms);
    this.durationMax = this.durationCount === 0 ? ms : Math.max(this.durationMax, ms);
    this.durationCount += 1;
    this.durationTotal += ms;
  }

  snapshot(): MetricSnapshot {
    const counters: Partial<Record<CounterName, number>> = {};
    for (const name of COUNTER_NAMES) {
      counters[name] = this.count(name);
    }

    const gauges: Partial<Record<GaugeName, number>> = {};
    for (const [key, value] of this.gauges) {
      gauges[key] = value;
    }

    const count = this.durationCount;
    const total = this.durationTotal;

    return {
      counters,
      gauges,
      fetchDurations: {
        count,
        min: this.durationMin,
        max: this.durationMax,
        avg: count > 0 ? total / count : 0,
        total,
      },
    };
  }

  log(logger: Pick<Logger, 'info'>): void {
    logger.info('[Metrics]', this.snapshot());
  }
}

export { COUNTER_NAMES };
export type { CounterName, DurationSummary, GaugeName, MetricSnapshot };
