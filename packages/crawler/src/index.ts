export { CrawlOrchestrator } from './orchestrator/crawler.js';
export type {
  CrawlerDependencies,
  CrawlSummary,
  SkipReason,
} from './orchestrator/types.js';
export {
  DEFAULT_USER_AGENT,
  crawlConfigSchema,
  parseCrawlConfig,
  type CrawlConfig,
  type CrawlConfigInput,
} from './config/crawl-config.js';
export {
  CrawlerError,
  ConfigurationError,
  RendererUnavailableError,
  RenderTimeoutError,
  type CrawlerErrorCode,
} from './errors.js';
export { isAllowedDomain, normalizeUrl } from './utils/url.js';
export { Frontier } from './frontier/frontier.js';
export { PageBudget } from './frontier/page-budget.js';
export type { CrawlTask, TaskState } from './frontier/types.js';
export { ConcurrencyGovernor } from './concurrency/concurrency-governor.js';
export { PolitenessGate } from './politeness/politeness-gate.js';
export { parseRobotsTxt } from './politeness/robots-parser.js';
export type { RobotsPolicy } from './politeness/types.js';
export {
  HttpClient,
  type HttpFailureReason,
  type HttpResult,
} from './http/types.js';
export { AxiosHttpClient } from './http/axios-client.js';
export { PageRenderer } from './render/types.js';
export { PlaywrightRenderer } from './render/playwright-renderer.js';
export {
  RENDER_POLICIES,
  needsRender,
  shouldRender,
  type RenderPolicy,
} from './render/render-decision.js';
export { FetchPipeline, type FetchOutcome } from './fetch/fetch-pipeline.js';
export {
  Extractor,
  type JsonLdObject,
  type PageMetadata,
  type StructuredData,
} from './extraction/types.js';
export { CheerioExtractor } from './extraction/cheerio-extractor.js';
export { PageProcessor } from './pipeline/page-processor.js';
export {
  CrawlStorage,
  type PageRecord,
  type SavedImage,
} from './storage/types.js';
export { FileSystemStorage } from './storage/file-system-storage.js';
export { CrawlMetrics, type MetricSnapshot } from './observability/metrics.js';
