import { createLogger } from '@workspace/logger';
import {
  RendererUnavailableError,
  RenderTimeoutError,
  errorMessage,
} from '../errors.js';
import { PageRenderer } from './types.js';

const log = createLogger('PlaywrightRenderer');

// The slice of playwright-core's API the renderer drives
type RenderPage = {
  goto(
    url: string,
    options: { waitUntil: 'networkidle'; timeout: number },
  ): Promise<unknown>;
  content(): Promise<string>;
};

type RenderContext = {
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
};

type RenderBrowser = {
  newContext(options: { userAgent: string }): Promise<RenderContext>;
  close(): Promise<void>;
};

type BrowserLauncher = {
  launch(options: { headless: boolean; args?: string[] }): Promise<RenderBrowser>;
};

type PlaywrightRendererConfig = {
  userAgent: string;
  headless?: boolean;
  /** Resolves the browser type to launch; defaults to playwright-core's chromium. */
  loadLauncher?: () => Promise<BrowserLauncher>;
};

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--mute-audio',
  '--no-first-run',
];

const loadChromium = async (): Promise<BrowserLauncher> => {
  const { chromium } = await import('playwright-core');
  return chromium;
};

const isTimeoutError = (error: unknown): boolean =>
  error instanceof Error && error.name === 'TimeoutError';

/**
 * Chromium through playwright-core. The browser is launched on first use
 * and every render gets its own context, closed as soon as the HTML is read.
 */
export class PlaywrightRenderer extends PageRenderer {
  private readonly config: PlaywrightRendererConfig;
  private browserPromise: Promise<RenderBrowser> | null;
  private closed: boolean;

  constructor(config: PlaywrightRendererConfig) {
    super();
    this.config = config;
    this.browserPromise = null;
    this.closed = false;
  }

  async start(): Promise<void> {
    await this.ensureBrowser();
  }

  async render(url: string, timeoutMs: number): Promise<string> {
    const browser = await this.ensureBrowser();
    const context = await browser.newContext({
      userAgent: this.config.userAgent,
    });

    try {
      const page = await context.newPage();
      await page.goto(url, { waitUntil: 'networkidle', timeout: timeoutMs });
      return await page.content();
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new RenderTimeoutError(url, timeoutMs, { cause: error });
      }
      throw error;
    } finally {
      await context.close().catch((error: unknown) => {
        log.debug(`Failed to close context for ${url}:`, errorMessage(error));
      });
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    const pending = this.browserPromise;
    this.browserPromise = null;

    if (!pending) {
      return;
    }

    try {
      const browser = await pending;
      await browser.close();
      log.debug('Browser closed');
    } catch (error) {
      log.debug('Browser was not running at shutdown:', errorMessage(error));
    }
  }

  private ensureBrowser(): Promise<RenderBrowser> {
    if (this.closed) {
      return Promise.reject(
        new RendererUnavailableError('Renderer has been closed'),
      );
    }

    if (!this.browserPromise) {
      this.browserPromise = this.launch();
    }
    return this.browserPromise;
  }

  private async launch(): Promise<RenderBrowser> {
    let launcher: BrowserLauncher;
    try {
      launcher = await (this.config.loadLauncher ?? loadChromium)();
    } catch (error) {
      throw new RendererUnavailableError(
        'playwright-core is not installed; install it or crawl with --render never',
        { cause: error },
      );
    }

    try {
      log.info('Launching headless browser');
      return await launcher.launch({
        headless: this.config.headless ?? true,
        args: LAUNCH_ARGS,
      });
    } catch (error) {
      throw new RendererUnavailableError(
        `Headless browser could not be launched: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}

export type {
  BrowserLauncher,
  PlaywrightRendererConfig,
  RenderBrowser,
  RenderContext,
  RenderPage,
};
