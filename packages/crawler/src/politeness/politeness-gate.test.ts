import { describe, it, expect } from 'vitest';
import { FakeHttpClient } from '../testing/fake-http-client.js';
import { PolitenessGate } from './politeness-gate.js';

const USER_AGENT = 'TestCrawler/1.0';

describe('PolitenessGate', () => {
  it('enforces a robots.txt that disallows /private/', async () => {
    const http = new FakeHttpClient({
      'http://x.com/robots.txt': { body: 'User-agent: *\nDisallow: /private/' },
    });
    const gate = new PolitenessGate(http, { enabled: true, userAgent: USER_AGENT });

    expect(await gate.allowed('http://x.com/private/x')).toBe(false);
    expect(await gate.allowed('http://x.com/public')).toBe(true);
  });

  it('fails open when robots.txt is unreachable', async () => {
    const http = new FakeHttpClient({
      'http://x.com/robots.txt': { failWith: 'network' },
    });
    const gate = new PolitenessGate(http, { enabled: true, userAgent: USER_AGENT });

    expect(await gate.allowed('http://x.com/private/x')).toBe(true);
    expect(await gate.allowed('http://x.com/public')).toBe(true);
  });

  it('fails open on a non-200 robots.txt', async () => {
    const http = new FakeHttpClient({
      'http://x.com/robots.txt': { status: 500, body: 'User-agent: *\nDisallow: /' },
    });
    const gate = new PolitenessGate(http, { enabled: true, userAgent: USER_AGENT });

    expect(await gate.allowed('http://x.com/anything')).toBe(true);
  });

  it('fetches robots.txt once per origin, even for concurrent checks', async () => {
    const http = new FakeHttpClient({
      'https://a.com/robots.txt': { body: 'User-agent: *\nDisallow: /no', delayMs: 20 },
    });
    const gate = new PolitenessGate(http, { enabled: true, userAgent: USER_AGENT });

    const results = await Promise.all([
      gate.allowed('https://a.com/yes'),
      gate.allowed('https://a.com/no'),
      gate.allowed('https://a.com/other'),
    ]);
    await gate.allowed('https://a.com/later');

    expect(results).toEqual([true, false, true]);
    expect(http.requestCount('https://a.com/robots.txt')).toBe(1);
    expect(gate.cachedOrigins).toBe(1);
  });

  it('keeps separate policies per origin', async () => {
    const http = new FakeHttpClient({
      'https://a.com/robots.txt': { body: 'User-agent: *\nDisallow: /' },
    });
    const gate = new PolitenessGate(http, { enabled: true, userAgent: USER_AGENT });

    expect(await gate.allowed('https://a.com/page')).toBe(false);
    expect(await gate.allowed('https://b.com/page')).toBe(true);
    expect(http.requests).toEqual([
      'https://a.com/robots.txt',
      'https://b.com/robots.txt',
    ]);
  });

  it('exposes the crawl delay once the policy is cached', async () => {
    const http = new FakeHttpClient({
      'https://a.com/robots.txt': { body: 'User-agent: *\nCrawl-delay: 3' },
    });
    const gate = new PolitenessGate(http, { enabled: true, userAgent: USER_AGENT });

    expect(gate.crawlDelayMs('https://a.com/page')).toBeUndefined();
    await gate.allowed('https://a.com/page');
    expect(gate.crawlDelayMs('https://a.com/page')).toBe(3000);
  });

  it('allows everything without fetching when disabled', async () => {
    const http = new FakeHttpClient({
      'https://a.com/robots.txt': { body: 'User-agent: *\nDisallow: /' },
    });
    const gate = new PolitenessGate(http, { enabled: false, userAgent: USER_AGENT });

    expect(await gate.allowed('https://a.com/page')).toBe(true);
    expect(http.requests).toHaveLength(0);
  });
});
