type HttpFailureReason = 'network' | 'timeout' | 'http-status' | 'content-type';

type HttpSuccess<T> = {
  ok: true;
  status: number;
  finalUrl: string;
  contentType: string;
  contentDisposition?: string;
  body: T;
  durationMs: number;
};

type HttpFailure = {
  ok: false;
  reason: HttpFailureReason;
  error: string;
  status?: number;
  durationMs: number;
};

type HttpResult<T> = HttpSuccess<T> | HttpFailure;

/**
 * Transport used by the crawl. Implementations never throw for a failed
 * retrieval; failures come back as `{ ok: false }`.
 */
abstract class HttpClient {
  /** 200 responses with an HTML content type; anything else is a failure. */
  abstract getDocument(url: string): Promise<HttpResult<string>>;

  /** 200 responses of any content type, decoded as text. */
  abstract getText(url: string): Promise<HttpResult<string>>;

  /** 200 responses of any content type, as raw bytes. */
  abstract getBinary(url: string): Promise<HttpResult<Uint8Array>>;

  abstract close(): Promise<void>;
}

const isHtmlContentType = (contentType: string): boolean => {
  const value = contentType.toLowerCase();
  return value.includes('text/html') || value.startsWith('application/xhtml');
};

export { HttpClient, isHtmlContentType };
export type { HttpFailure, HttpFailureReason, HttpResult, HttpSuccess };
