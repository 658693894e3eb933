import { RendererUnavailableError, RenderTimeoutError } from '../errors.js';
import { PageRenderer } from '../render/types.js';

type FakeRender = string | 'timeout' | 'unavailable';

/** In-process renderer answering from a table of URL → HTML or failure. */
export class FakeRenderer extends PageRenderer {
  readonly rendered: string[];
  started: boolean;
  closed: boolean;
  private readonly pages: Map<string, FakeRender>;
  private readonly failStart: boolean;

  constructor(pages: Record<string, FakeRender> = {}, options?: { failStart?: boolean }) {
    super();
    this.rendered = [];
    this.started = false;
    this.closed = false;
    this.pages = new Map(Object.entries(pages));
    this.failStart = options?.failStart ?? false;
  }

  async start(): Promise<void> {
    if (this.failStart) {
      throw new RendererUnavailableError('fake renderer cannot start');
    }
    this.started = true;
  }

  async render(url: string, timeoutMs: number): Promise<string> {
    await this.start();
    this.rendered.push(url);

    const page = this.pages.get(url);
    if (page === 'timeout') {
      throw new RenderTimeoutError(url, timeoutMs);
    }
    if (page === 'unavailable' || page === undefined) {
      throw new RendererUnavailableError(`no rendering for ${url}`);
    }
    return page;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export type { FakeRender };
