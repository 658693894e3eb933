import { createLogger } from '@workspace/logger';
import { ConcurrencyGovernor } from '../concurrency/concurrency-governor.js';
import type { CrawlConfig } from '../config/crawl-config.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { CheerioExtractor } from '../extraction/cheerio-extractor.js';
import { FetchPipeline } from '../fetch/fetch-pipeline.js';
import { Frontier } from '../frontier/frontier.js';
import { PageBudget } from '../frontier/page-budget.js';
import type { CrawlTask } from '../frontier/types.js';
import { AxiosHttpClient } from '../http/axios-client.js';
import type { HttpClient } from '../http/types.js';
import { CrawlMetrics } from '../observability/metrics.js';
import { PageProcessor } from '../pipeline/page-processor.js';
import { PolitenessGate } from '../politeness/politeness-gate.js';
import { PlaywrightRenderer } from '../render/playwright-renderer.js';
import type { PageRenderer } from '../render/types.js';
import { FileSystemStorage } from '../storage/file-system-storage.js';
import type { CrawlStorage } from '../storage/types.js';
import { isAllowedDomain, normalizeUrl } from '../utils/url.js';
import type { CrawlerDependencies, CrawlSummary, SkipReason } from './types.js';

const log = createLogger('Crawler');

const MIN_WORKERS = 2;
const MAX_WORKERS = 32;
const DEQUEUE_WAIT_MS = 1_500;
const METRICS_INTERVAL_MS = 30_000;

/**
 * Runs one crawl: a fixed pool of workers pulls tasks from the frontier,
 * filters them, and fetches and processes the survivors under the
 * concurrency governor. The crawl ends when every queued task has been
 * accounted for, or on operator cancellation.
 */
export class CrawlOrchestrator {
  private readonly config: CrawlConfig;
  private readonly http: HttpClient;
  private readonly renderer: PageRenderer | undefined;
  private readonly storage: CrawlStorage;
  private readonly metrics: CrawlMetrics;
  private readonly crawlFrontier: Frontier;
  private readonly budget: PageBudget;
  private readonly governor: ConcurrencyGovernor;
  private readonly gate: PolitenessGate;
  private readonly pipeline: FetchPipeline;
  private readonly processor: PageProcessor;
  private readonly abortController: AbortController;
  private cancelled: boolean;

  constructor(config: CrawlConfig, dependencies: CrawlerDependencies = {}) {
    this.config = config;
    this.http =
      dependencies.http ??
      new AxiosHttpClient({
        userAgent: config.userAgent,
        timeoutMs: config.requestTimeoutMs,
        maxSockets: config.concurrency,
      });
    this.renderer =
      config.render === 'never'
        ? undefined
        : dependencies.renderer ??
          new PlaywrightRenderer({ userAgent: config.userAgent });
    this.storage = dependencies.storage ?? new FileSystemStorage(config.outputDir);
    this.metrics = new CrawlMetrics();
    this.crawlFrontier = new Frontier();
    this.budget = new PageBudget(config.maxPages);
    this.governor = new ConcurrencyGovernor({
      globalLimit: config.concurrency,
      perOriginLimit: config.perOriginConcurrency,
    });
    this.gate = new PolitenessGate(this.http, {
      enabled: config.respectRobots,
      userAgent: config.userAgent,
    });
    this.pipeline = new FetchPipeline({
      http: this.http,
      renderer: this.renderer,
      renderPolicy: config.render,
      renderTimeoutMs: config.renderTimeoutMs,
      metrics: this.metrics,
    });
    this.processor = new PageProcessor({
      frontier: this.crawlFrontier,
      extractor: dependencies.extractor ?? new CheerioExtractor(),
      storage: this.storage,
      http: this.http,
      allowedDomains: config.allowedDomains,
      downloadImages: config.downloadImages,
      imageConcurrency: config.imageConcurrency,
      metrics: this.metrics,
    });
    this.abortController = new AbortController();
    this.cancelled = false;
  }

  async run(): Promise<CrawlSummary> {
    const startedAt = Date.now();
    const { signal } = this.abortController;

    const onShutdown = (): void => {
      log.warn('Shutdown requested, finishing in-flight pages');
      this.stop();
    };
    process.on('SIGINT', onShutdown);
    process.on('SIGTERM', onShutdown);

    const metricsInterval = setInterval(() => {
      this.updateGauges();
      this.metrics.log(log);
    }, METRICS_INTERVAL_MS);

    try {
      await this.storage.initialize();
      await this.startRenderer();
      this.enqueueSeeds();

      const workerCount = Math.max(
        MIN_WORKERS,
        Math.min(MAX_WORKERS, this.config.concurrency),
      );
      log.info(
        `Crawl started: ${this.crawlFrontier.pendingCount} seed(s), ${workerCount} workers, budget ${this.config.maxPages} pages`,
      );

      const workers = Array.from({ length: workerCount }, () =>
        this.runWorker(signal),
      );

      await Promise.race([this.crawlFrontier.whenIdle(), abortedPromise(signal)]);

      this.abortController.abort();
      await Promise.all(workers);
    } finally {
      clearInterval(metricsInterval);
      process.removeListener('SIGINT', onShutdown);
      process.removeListener('SIGTERM', onShutdown);

      await this.closeResources();
      this.updateGauges();
      this.metrics.log(log);
    }

    const summary: CrawlSummary = {
      pagesProcessed: this.budget.processed,
      tasksSeen: this.crawlFrontier.size(),
      durationMs: Date.now() - startedAt,
      cancelled: this.cancelled,
      metrics: this.metrics.snapshot(),
    };
    log.info(
      `Crawl finished: ${summary.pagesProcessed} pages processed, ${summary.tasksSeen} tasks seen in ${summary.durationMs}ms`,
    );

    return summary;
  }

  /** Stops taking new tasks; pages already in flight still finish. */
  stop(): void {
    if (this.abortController.signal.aborted) {
      return;
    }

    this.cancelled = true;
    this.abortController.abort();
  }

  get frontier(): Frontier {
    return this.crawlFrontier;
  }

  get pagesProcessed(): number {
    return this.budget.processed;
  }

  private async startRenderer(): Promise<void> {
    if (this.config.render !== 'always' || !this.renderer) {
      return;
    }

    try {
      await this.renderer.start();
    } catch (error) {
      throw new ConfigurationError(
        `Render policy "always" needs a working headless browser: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private enqueueSeeds(): void {
    for (const seed of this.config.seeds) {
      const url = normalizeUrl(seed, seed);
      if (!url) {
        log.warn(`Ignoring seed that cannot be crawled: ${seed}`);
        continue;
      }

      this.crawlFrontier.enqueue(url, 0);
    }
  }

  private async runWorker(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const task = await this.crawlFrontier.dequeue({
        timeoutMs: DEQUEUE_WAIT_MS,
        signal,
      });

      if (!task) {
        if (this.crawlFrontier.isIdle() || this.budget.exhausted) {
          return;
        }
        continue;
      }

      try {
        await this.handleTask(task);
      } catch (error) {
        this.metrics.increment('pages.failed');
        log.error(`Unexpected failure on ${task.url}:`, errorMessage(error));
      } finally {
        this.crawlFrontier.complete(task);
      }
    }
  }

  private async handleTask(task: CrawlTask): Promise<void> {
    const { url } = task;

    if (this.budget.exhausted) {
      return this.skip(task, 'budget');
    }
    if (this.crawlFrontier.isVisited(url)) {
      return this.skip(task, 'visited');
    }
    if (task.depth > this.config.maxDepth) {
      return this.skip(task, 'depth');
    }
    if (!isAllowedDomain(url, this.config.allowedDomains)) {
      return this.skip(task, 'domain');
    }
    if (!(await this.gate.allowed(url))) {
      return this.skip(task, 'robots');
    }

    // Slots held by in-flight pages may still be released
    while (!this.budget.tryReserve()) {
      if (this.budget.exhausted) {
        return this.skip(task, 'budget');
      }
      await this.budget.whenSettled();
    }
    if (!this.crawlFrontier.markVisited(url)) {
      this.budget.release();
      return this.skip(task, 'visited');
    }

    let produced = false;
    try {
      const minIntervalMs = Math.max(
        this.config.delayMs,
        this.gate.crawlDelayMs(url) ?? 0,
      );
      produced = await this.governor.run(url, () => this.fetchAndProcess(task), {
        minIntervalMs,
      });
    } finally {
      if (produced) {
        this.budget.commit();
        this.metrics.increment('pages.processed');
      } else {
        this.budget.release();
      }
    }
  }

  private async fetchAndProcess(task: CrawlTask): Promise<boolean> {
    const outcome = await this.pipeline.fetch(task.url);

    if (outcome.kind === 'none') {
      this.metrics.increment('pages.failed');
      log.debug(`No content for ${task.url} (${outcome.reason})`);
      return false;
    }

    const { enqueued } = await this.processor.process(task, outcome);
    log.info(
      `Saved ${task.url} [depth ${task.depth}, ${outcome.source}, +${enqueued} links]`,
    );
    return true;
  }

  private skip(task: CrawlTask, reason: SkipReason): void {
    this.metrics.increment('tasks.skipped');
    log.debug(`Skipping ${task.url} (${reason})`);
  }

  private updateGauges(): void {
    this.metrics.gauge('frontier.pending', this.crawlFrontier.pendingCount);
    this.metrics.gauge('frontier.inFlight', this.crawlFrontier.inFlightCount);
    this.metrics.gauge('frontier.visited', this.crawlFrontier.visitedCount);
    this.metrics.gauge('governor.inFlight', this.governor.inFlight);
    this.metrics.gauge('governor.waiting', this.governor.waiting);
    this.metrics.gauge('governor.origins', this.governor.originCount);
  }

  private async closeResources(): Promise<void> {
    const results = await Promise.allSettled([
      this.http.close(),
      this.renderer?.close(),
    ]);

    for (const result of results) {
      if (result.status === 'rejected') {
        log.warn('Failed to release crawl resources:', errorMessage(result.reason));
      }
    }
  }
}

function abortedPromise(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}
