import type { Extractor } from '../extraction/types.js';
import type { HttpClient } from '../http/types.js';
import type { MetricSnapshot } from '../observability/metrics.js';
import type { PageRenderer } from '../render/types.js';
import type { CrawlStorage } from '../storage/types.js';

/** Collaborators the orchestrator builds itself unless they are supplied. */
type CrawlerDependencies = {
  http?: HttpClient;
  /** Ignored when the render policy is `never`. */
  renderer?: PageRenderer;
  extractor?: Extractor;
  storage?: CrawlStorage;
};

type SkipReason = 'budget' | 'visited' | 'depth' | 'domain' | 'robots';

type CrawlSummary = {
  pagesProcessed: number;
  /** Every address ever placed on the frontier, seeds included. */
  tasksSeen: number;
  durationMs: number;
  /** True when the crawl ended on SIGINT/SIGTERM or `stop()`. */
  cancelled: boolean;
  metrics: MetricSnapshot;
};

export type { CrawlerDependencies, CrawlSummary, SkipReason };
