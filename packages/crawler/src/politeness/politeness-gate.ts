import { createLogger } from '@workspace/logger';
import { errorMessage } from '../errors.js';
import type { HttpClient } from '../http/types.js';
import { originOf } from '../utils/url.js';
import { buildAllowAllPolicy, parseRobotsTxt } from './robots-parser.js';
import type { RobotsPolicy } from './types.js';

const log = createLogger('PolitenessGate');

type PolitenessGateConfig = {
  /** When false every address is allowed and robots.txt is never fetched. */
  enabled: boolean;
  userAgent: string;
};

/**
 * Per-origin robots.txt cache. The first check for an origin fetches and
 * parses its robots.txt; any failure caches an allow-all policy. Concurrent
 * first checks share the same pending lookup.
 */
export class PolitenessGate {
  private readonly http: HttpClient;
  private readonly config: PolitenessGateConfig;
  private readonly pending: Map<string, Promise<RobotsPolicy>>;
  private readonly policies: Map<string, RobotsPolicy>;

  constructor(http: HttpClient, config: PolitenessGateConfig) {
    this.http = http;
    this.config = config;
    this.pending = new Map();
    this.policies = new Map();
  }

  async allowed(url: string): Promise<boolean> {
    if (!this.config.enabled) {
      return true;
    }

    const policy = await this.policyFor(originOf(url));
    return policy.isAllowed(url);
  }

  /** Crawl-delay of the cached policy for the address's origin, if any. */
  crawlDelayMs(url: string): number | undefined {
    if (!this.config.enabled) {
      return undefined;
    }

    return this.policies.get(originOf(url))?.crawlDelayMs;
  }

  get cachedOrigins(): number {
    return this.pending.size;
  }

  private policyFor(origin: string): Promise<RobotsPolicy> {
    let lookup = this.pending.get(origin);
    if (!lookup) {
      lookup = this.loadPolicy(origin).then((policy) => {
        this.policies.set(origin, policy);
        return policy;
      });
      this.pending.set(origin, lookup);
    }
    return lookup;
  }

  private async loadPolicy(origin: string): Promise<RobotsPolicy> {
    const robotsUrl = `${origin}/robots.txt`;

    try {
      const result = await this.http.getText(robotsUrl);
      if (!result.ok) {
        log.debug(`No robots.txt for ${origin} (${result.error}), allowing all`);
        return buildAllowAllPolicy();
      }

      const policy = parseRobotsTxt(result.body, this.config.userAgent);
      log.debug(`Loaded robots.txt for ${origin}`);
      return policy;
    } catch (error) {
      log.warn(`robots.txt for ${origin} could not be read, allowing all:`, errorMessage(error));
      return buildAllowAllPolicy();
    }
  }
}

export type { PolitenessGateConfig };
