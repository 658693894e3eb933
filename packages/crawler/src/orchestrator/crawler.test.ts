import { describe, it, expect } from 'vitest';
import { parseCrawlConfig, type CrawlConfigInput } from '../config/crawl-config.js';
import { ConfigurationError } from '../errors.js';
import { FakeHttpClient } from '../testing/fake-http-client.js';
import { FakeRenderer } from '../testing/fake-renderer.js';
import { MemoryStorage } from '../testing/memory-storage.js';
import { CrawlOrchestrator } from './crawler.js';

const SITE = 'https://site.test';

const linksTo = (...hrefs: string[]): string =>
  `<html><body><p>Page</p>${hrefs.map((href) => `<a href="${href}">link</a>`).join('')}</body></html>`;

function makeCrawler(
  http: FakeHttpClient,
  overrides?: Partial<CrawlConfigInput>,
  renderer?: FakeRenderer,
) {
  const storage = new MemoryStorage();
  const config = parseCrawlConfig({
    seeds: [`${SITE}/`],
    allowedDomains: ['site.test'],
    render: 'never',
    downloadImages: false,
    concurrency: 4,
    ...overrides,
  });

  const crawler = new CrawlOrchestrator(config, { http, storage, renderer });
  return { crawler, storage };
}

const recordedUrls = (storage: MemoryStorage): string[] =>
  storage.records.map((record) => record.url).sort();

describe('CrawlOrchestrator', () => {
  it('enqueues two allowed links and persists one record with a budget of one page', async () => {
    const http = new FakeHttpClient().page(
      `${SITE}/`,
      linksTo('/a', '/b', 'https://other.test/x'),
    );
    const { crawler, storage } = makeCrawler(http, { maxPages: 1 });

    const summary = await crawler.run();

    expect(crawler.frontier.size()).toBe(3);
    expect(crawler.frontier.isEnqueued('https://other.test/x')).toBe(false);
    expect(storage.records).toHaveLength(1);
    expect(storage.records[0]?.url).toBe(`${SITE}/`);
    expect(summary.pagesProcessed).toBe(1);
    expect(summary.tasksSeen).toBe(3);
    expect(summary.cancelled).toBe(false);
    expect(http.closed).toBe(true);
  });

  it('visits every reachable page exactly once', async () => {
    const http = new FakeHttpClient()
      .page(`${SITE}/`, linksTo('/a', '/b'))
      .page(`${SITE}/a`, linksTo('/', '/b', '/a#section'))
      .page(`${SITE}/b`, linksTo('/a', '/c?utm_campaign=x'))
      .page(`${SITE}/c`, linksTo());
    const { crawler, storage } = makeCrawler(http);

    const summary = await crawler.run();

    expect(recordedUrls(storage)).toEqual([
      `${SITE}/`,
      `${SITE}/a`,
      `${SITE}/b`,
      `${SITE}/c`,
    ]);
    expect(crawler.frontier.visitedCount).toBe(4);
    expect(http.requestCount(`${SITE}/a`)).toBe(1);
    expect(summary.metrics.counters['pages.processed']).toBe(4);
  });

  it('never processes tasks deeper than maxDepth', async () => {
    const http = new FakeHttpClient()
      .page(`${SITE}/`, linksTo('/d1'))
      .page(`${SITE}/d1`, linksTo('/d2'))
      .page(`${SITE}/d2`, linksTo('/d3'))
      .page(`${SITE}/d3`, linksTo());
    const { crawler, storage } = makeCrawler(http, { maxDepth: 1 });

    await crawler.run();

    expect(recordedUrls(storage)).toEqual([`${SITE}/`, `${SITE}/d1`]);
    expect(crawler.frontier.isEnqueued(`${SITE}/d2`)).toBe(true);
    expect(http.requestCount(`${SITE}/d2`)).toBe(0);
  });

  it('never processes more pages than the budget under concurrency', async () => {
    const paths = Array.from({ length: 20 }, (_, i) => `/p${i}`);
    const http = new FakeHttpClient().page(`${SITE}/`, linksTo(...paths));
    for (const path of paths) {
      http.route(`${SITE}${path}`, {
        body: linksTo(...paths),
        contentType: 'text/html',
        delayMs: 5,
      });
    }
    const { crawler, storage } = makeCrawler(http, {
      maxPages: 5,
      concurrency: 8,
      perOriginConcurrency: 8,
    });

    const summary = await crawler.run();

    expect(storage.records).toHaveLength(5);
    expect(summary.pagesProcessed).toBe(5);
    expect(crawler.frontier.size()).toBe(21);
  });

  it('gives a released budget slot to a page that was waiting for it', async () => {
    const http = new FakeHttpClient()
      .route(`${SITE}/missing`, { status: 404, delayMs: 50 })
      .page(`${SITE}/found`, linksTo());
    const { crawler, storage } = makeCrawler(http, {
      seeds: [`${SITE}/missing`, `${SITE}/found`],
      maxPages: 1,
      concurrency: 2,
    });

    const summary = await crawler.run();

    expect(summary.pagesProcessed).toBe(1);
    expect(recordedUrls(storage)).toEqual([`${SITE}/found`]);
    expect(http.requestCount(`${SITE}/missing`)).toBe(1);
    expect(summary.metrics.counters['tasks.skipped']).toBe(0);
  });

  it('does not fetch pages that robots.txt disallows', async () => {
    const http = new FakeHttpClient({
      [`${SITE}/robots.txt`]: { body: 'User-agent: *\nDisallow: /private/' },
    })
      .page(`${SITE}/`, linksTo('/private/x', '/public'))
      .page(`${SITE}/private/x`, linksTo())
      .page(`${SITE}/public`, linksTo());
    const { crawler, storage } = makeCrawler(http);

    const summary = await crawler.run();

    expect(recordedUrls(storage)).toEqual([`${SITE}/`, `${SITE}/public`]);
    expect(http.requestCount(`${SITE}/private/x`)).toBe(0);
    expect(http.requestCount(`${SITE}/robots.txt`)).toBe(1);
    expect(summary.metrics.counters['tasks.skipped']).toBe(1);
  });

  it('ignores robots.txt when robots enforcement is off', async () => {
    const http = new FakeHttpClient({
      [`${SITE}/robots.txt`]: { body: 'User-agent: *\nDisallow: /' },
    }).page(`${SITE}/`, linksTo());
    const { crawler, storage } = makeCrawler(http, { respectRobots: false });

    await crawler.run();

    expect(storage.records).toHaveLength(1);
    expect(http.requestCount(`${SITE}/robots.txt`)).toBe(0);
  });

  it('treats an unreachable page as a soft failure', async () => {
    const http = new FakeHttpClient()
      .page(`${SITE}/`, linksTo('/down', '/ok'))
      .route(`${SITE}/down`, { failWith: 'network' })
      .page(`${SITE}/ok`, linksTo());
    const { crawler, storage } = makeCrawler(http);

    const summary = await crawler.run();

    expect(recordedUrls(storage)).toEqual([`${SITE}/`, `${SITE}/ok`]);
    expect(summary.pagesProcessed).toBe(2);
    expect(summary.metrics.counters['pages.failed']).toBe(1);
    expect(summary.metrics.counters['fetch.failed']).toBe(1);
  });

  it('uses rendered content for client-rendered pages', async () => {
    const http = new FakeHttpClient().page(
      `${SITE}/`,
      '<html><body><div id="root"></div></body></html>',
    );
    const renderer = new FakeRenderer({
      [`${SITE}/`]: '<html><body><div id="root"><p>Rendered text</p></div></body></html>',
    });
    const { crawler, storage } = makeCrawler(http, { render: 'auto' }, renderer);

    await crawler.run();

    expect(storage.records[0]?.text).toBe('Rendered text');
    expect(renderer.rendered).toEqual([`${SITE}/`]);
    expect(renderer.closed).toBe(true);
  });

  it('fails at startup when rendering is required but the engine cannot start', async () => {
    const http = new FakeHttpClient().page(`${SITE}/`, linksTo());
    const renderer = new FakeRenderer({}, { failStart: true });
    const { crawler, storage } = makeCrawler(http, { render: 'always' }, renderer);

    await expect(crawler.run()).rejects.toBeInstanceOf(ConfigurationError);
    expect(storage.records).toHaveLength(0);
    expect(http.requests).toHaveLength(0);
    expect(http.closed).toBe(true);
  });

  it('stops taking tasks once cancelled', async () => {
    const http = new FakeHttpClient().page(`${SITE}/`, linksTo('/a'));
    const { crawler, storage } = makeCrawler(http);

    const running = crawler.run();
    crawler.stop();
    const summary = await running;

    expect(summary.cancelled).toBe(true);
    expect(summary.pagesProcessed).toBe(0);
    expect(storage.records).toHaveLength(0);
    expect(http.closed).toBe(true);
  });
});
