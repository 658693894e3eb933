/**
 * Headless rendering engine. Started lazily on the first render, shared by
 * every worker, and closed once at the end of the crawl.
 */
abstract class PageRenderer {
  /**
   * Starts the engine if it is not running yet. Concurrent callers share
   * one start; a failed start is remembered.
   */
  abstract start(): Promise<void>;

  /**
   * Fully rendered HTML of `url`. Rejects with `RenderTimeoutError` or
   * `RendererUnavailableError`.
   */
  abstract render(url: string, timeoutMs: number): Promise<string>;

  abstract close(): Promise<void>;
}

export { PageRenderer };
