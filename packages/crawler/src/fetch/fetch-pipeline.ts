import { createLogger } from '@workspace/logger';
import { errorMessage } from '../errors.js';
import type { HttpClient, HttpFailureReason } from '../http/types.js';
import type { CrawlMetrics } from '../observability/metrics.js';
import { needsRender, type RenderPolicy } from '../render/render-decision.js';
import type { PageRenderer } from '../render/types.js';

const log = createLogger('FetchPipeline');

type FetchOutcome =
  | {
      kind: 'content';
      html: string;
      contentDisposition?: string;
      source: 'raw' | 'rendered';
    }
  | {
      kind: 'none';
      reason: HttpFailureReason;
      error: string;
      renderError?: string;
    };

type FetchPipelineConfig = {
  http: HttpClient;
  /** Absent when rendering is disabled. */
  renderer?: PageRenderer;
  renderPolicy: RenderPolicy;
  renderTimeoutMs: number;
  metrics?: CrawlMetrics;
};

/**
 * Raw retrieval followed by an optional rendering pass. Never throws for a
 * single address: every failure ends as `{ kind: 'none' }`, or as the raw
 * content when only the rendering failed.
 */
export class FetchPipeline {
  private readonly config: FetchPipelineConfig;

  constructor(config: FetchPipelineConfig) {
    this.config = config;
  }

  async fetch(url: string): Promise<FetchOutcome> {
    const { http, renderer, renderPolicy, metrics } = this.config;

    const raw = await http.getDocument(url);
    metrics?.recordDuration(raw.durationMs);

    if (!raw.ok) {
      metrics?.increment('fetch.failed');
      log.warn(`Fetch failed for ${url} (${raw.reason}): ${raw.error}`);
    }

    const rawHtml = raw.ok ? raw.body : undefined;
    const contentDisposition = raw.ok ? raw.contentDisposition : undefined;

    if (!renderer || !needsRender(renderPolicy, rawHtml)) {
      return raw.ok
        ? { kind: 'content', html: raw.body, contentDisposition, source: 'raw' }
        : { kind: 'none', reason: raw.reason, error: raw.error };
    }

    log.debug(`Rendering ${url} (policy ${renderPolicy})`);
    metrics?.increment('render.invoked');

    let renderError: string;
    try {
      const html = await renderer.render(url, this.config.renderTimeoutMs);
      if (html) {
        return { kind: 'content', html, contentDisposition, source: 'rendered' };
      }
      renderError = 'Renderer returned an empty document';
    } catch (error) {
      renderError = errorMessage(error);
    }

    metrics?.increment('render.failed');
    log.warn(`Render failed for ${url}, falling back to raw content: ${renderError}`);

    if (raw.ok) {
      return { kind: 'content', html: raw.body, contentDisposition, source: 'raw' };
    }

    return { kind: 'none', reason: raw.reason, error: raw.error, renderError };
  }
}

export type { FetchOutcome, FetchPipelineConfig };
