import { createLogger } from '@workspace/logger';
import { Semaphore } from '../concurrency/semaphore.js';
import { errorMessage } from '../errors.js';
import type { Extractor } from '../extraction/types.js';
import type { Frontier } from '../frontier/frontier.js';
import type { CrawlTask } from '../frontier/types.js';
import type { HttpClient } from '../http/types.js';
import type { CrawlMetrics } from '../observability/metrics.js';
import type { CrawlStorage, PageRecord, SavedImage } from '../storage/types.js';
import { guessFilename, isAllowedDomain, normalizeUrl } from '../utils/url.js';
import type { PageContent, ProcessResult } from './types.js';

const log = createLogger('PageProcessor');

type PageProcessorConfig = {
  frontier: Frontier;
  extractor: Extractor;
  storage: CrawlStorage;
  /** Used for image downloads, outside the concurrency governor. */
  http: HttpClient;
  allowedDomains: readonly string[];
  downloadImages: boolean;
  imageConcurrency: number;
  metrics?: CrawlMetrics;
};

/**
 * Turns a fetched document into a persisted PageRecord and feeds the links
 * it discovers back into the frontier one level deeper.
 */
export class PageProcessor {
  private readonly config: PageProcessorConfig;
  private readonly imageSlots: Semaphore;

  constructor(config: PageProcessorConfig) {
    this.config = config;
    this.imageSlots = new Semaphore(config.imageConcurrency);
  }

  async process(task: CrawlTask, content: PageContent): Promise<ProcessResult> {
    const { extractor, storage } = this.config;
    const { url } = task;
    const { html } = content;

    const metadata = extractor.metadata(html, url);
    const text = extractor.text(html);
    const structuredData = extractor.structuredData(html, url);
    const links = extractor.links(html, url);
    const paginationLinks = extractor.paginationHints(html, url);
    const imageSources = this.config.downloadImages
      ? extractor.imageSources(html, url)
      : [];

    const documentPath = await storage.saveDocument(url, html);
    const images = await Promise.all(
      imageSources.map((src) => this.downloadImage(src, content.contentDisposition)),
    );

    const record: PageRecord = {
      url,
      documentPath,
      metadata,
      text,
      structuredData,
      links,
      paginationLinks,
      images,
    };
    await storage.appendRecord(record);

    const enqueued = this.enqueueLinks(task, [...links, ...paginationLinks]);
    log.debug(`Processed ${url}: ${links.length} links, ${enqueued} enqueued`);

    return { record, enqueued };
  }

  /**
   * Normalizes and enqueues discovered links at `task.depth + 1`, skipping
   * anything visited, already enqueued, or outside the allowlist.
   */
  enqueueLinks(task: CrawlTask, hrefs: string[]): number {
    const { frontier, allowedDomains, metrics } = this.config;
    let enqueued = 0;

    for (const href of hrefs) {
      const normalized = normalizeUrl(task.url, href);
      if (!normalized) {
        continue;
      }

      if (frontier.isVisited(normalized) || frontier.isEnqueued(normalized)) {
        continue;
      }

      if (!isAllowedDomain(normalized, allowedDomains)) {
        continue;
      }

      if (frontier.enqueue(normalized, task.depth + 1)) {
        enqueued += 1;
      }
    }

    metrics?.increment('links.enqueued', enqueued);
    return enqueued;
  }

  private downloadImage(
    src: string,
    pageContentDisposition: string | undefined,
  ): Promise<SavedImage> {
    const { http, storage, metrics } = this.config;

    return this.imageSlots.use(async () => {
      const result = await http.getBinary(src);
      if (!result.ok || result.body.length === 0) {
        metrics?.increment('images.failed');
        log.debug(`Image ${src} not downloaded`, result.ok ? 'empty body' : result.error);
        return { src };
      }

      const filename = guessFilename(
        src,
        result.contentDisposition ?? pageContentDisposition,
      );

      try {
        const savedPath = await storage.saveBinary(src, result.body, filename);
        metrics?.increment('images.saved');
        return { src, savedPath };
      } catch (error) {
        metrics?.increment('images.failed');
        log.warn(`Failed to save image ${src}:`, errorMessage(error));
        return { src };
      }
    });
  }
}

export type { PageProcessorConfig };
