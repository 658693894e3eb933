import { describe, it, expect, vi } from 'vitest';
import { CrawlMetrics } from './metrics.js';

describe('CrawlMetrics', () => {
  it('increments counters', () => {
    const metrics = new CrawlMetrics();
    metrics.increment('pages.processed');
    metrics.increment('pages.processed');
    metrics.increment('links.enqueued', 5);

    expect(metrics.count('pages.processed')).toBe(2);
    expect(metrics.count('links.enqueued')).toBe(5);
  });

  it('reports every counter in the snapshot, including zeros', () => {
    const metrics = new CrawlMetrics();
    metrics.increment('render.invoked');

    const snap = metrics.snapshot();
    expect(snap.counters).toEqual({
      'pages.processed': 0,
      'pages.failed': 0,
      'tasks.skipped': 0,
      'fetch.failed': 0,
      'render.invoked': 1,
      'render.failed': 0,
      'links.enqueued': 0,
      'images.saved': 0,
      'images.failed': 0,
    });
  });

  it('keeps the latest gauge value', () => {
    const metrics = new CrawlMetrics();
    metrics.gauge('frontier.pending', 4);
    metrics.gauge('governor.origins', 2);
    metrics.gauge('frontier.pending', 3);

    const snap = metrics.snapshot();
    expect(snap.gauges).toEqual({ 'frontier.pending': 3, 'governor.origins': 2 });
  });

  it('summarizes fetch durations', () => {
    const metrics = new CrawlMetrics();
    metrics.recordDuration(100);
    metrics.recordDuration(200);
    metrics.recordDuration(300);

    expect(metrics.snapshot().fetchDurations).toEqual({
      count: 3,
      min: 100,
      max: 300,
      avg: 200,
      total: 600,
    });
  });

  it('reports zeros without durations', () => {
    const metrics = new CrawlMetrics();

    expect(metrics.snapshot().fetchDurations).toEqual({
      count: 0,
      min: 0,
      max: 0,
      avg: 0,
      total: 0,
    });
  });

  it('logs the snapshot at info level', () => {
    const metrics = new CrawlMetrics();
    metrics.increment('images.saved');
    const info = vi.fn();

    metrics.log({ info });

    expect(info).toHaveBeenCalledWith('[Metrics]', metrics.snapshot());
  });

  it('summarizes a long crawl worth of durations', () => {
    const metrics = new CrawlMetrics();
    for (let index = 1; index <= 200_000; index++) {
      metrics.recordDuration(index % 1000);
    }

    expect(metrics.snapshot().fetchDurations).toEqual({
      count: 200_000,
      min: 0,
      max: 999,
      avg: 499.5,
      total: 99_900_000,
    });
  });
});
