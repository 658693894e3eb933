type CrawlerErrorCode =
  | 'configuration'
  | 'renderer-unavailable'
  | 'render-timeout';

class CrawlerError extends Error {
  readonly code: CrawlerErrorCode;

  constructor(code: CrawlerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CrawlerError';
    this.code = code;
  }
}

/** Invalid options or a missing engine; fatal at startup. */
class ConfigurationError extends CrawlerError {
  constructor(message: string, options?: ErrorOptions) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

class RendererUnavailableError extends CrawlerError {
  constructor(message: string, options?: ErrorOptions) {
    super('renderer-unavailable', message, options);
    this.name = 'RendererUnavailableError';
  }
}

class RenderTimeoutError extends CrawlerError {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, options?: ErrorOptions) {
    super(
      'render-timeout',
      `Rendering ${url} did not finish within ${timeoutMs}ms`,
      options,
    );
    this.name = 'RenderTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export {
  CrawlerError,
  ConfigurationError,
  RendererUnavailableError,
  RenderTimeoutError,
  errorMessage,
};
export type { CrawlerErrorCode };
