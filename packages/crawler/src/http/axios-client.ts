import http from 'node:http';
import https from 'node:https';
import axios from 'axios';
import type {
  AxiosAdapter,
  AxiosInstance,
  AxiosResponse,
  ResponseType,
} from 'axios';
import { createLogger } from '@workspace/logger';
import { errorMessage } from '../errors.js';
import {
  HttpClient,
  isHtmlContentType,
  type HttpFailureReason,
  type HttpResult,
} from './types.js';

const log = createLogger('HttpClient');

type AxiosHttpClientConfig = {
  userAgent: string;
  timeoutMs: number;
  /** Upper bound on open sockets per host, usually the global concurrency. */
  maxSockets: number;
  maxRedirects?: number;
  /** Replaces the network transport; used to run the client in-process. */
  adapter?: AxiosAdapter;
};

const readHeader = (
  headers: AxiosResponse['headers'],
  name: string,
): string | undefined => {
  const value: unknown = headers[name];

  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(String).join(', ');
  }

  return value === undefined || value === null ? undefined : String(value);
};

const classifyTransportError = (error: unknown): HttpFailureReason => {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'timeout';
    }
  }

  return errorMessage(error).toLowerCase().includes('timeout')
    ? 'timeout'
    : 'network';
};

/**
 * axios-backed transport with keep-alive agents shared across the crawl.
 * Redirects are followed; every status is resolved so the caller sees a
 * typed failure instead of an exception.
 */
export class AxiosHttpClient extends HttpClient {
  private readonly axiosInstance: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(config: AxiosHttpClientConfig) {
    super();

    const agentOptions = {
      keepAlive: true,
      keepAliveMsecs: 1000,
      maxSockets: config.maxSockets,
      maxFreeSockets: config.maxSockets,
      timeout: config.timeoutMs,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);

    this.axiosInstance = axios.create({
      timeout: config.timeoutMs,
      maxRedirects: config.maxRedirects ?? 5,
      validateStatus: () => true,
      headers: {
        'User-Agent': config.userAgent,
        Accept:
          'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });
  }

  async getDocument(url: string): Promise<HttpResult<string>> {
    const result = await this.request<string>(url, 'text');
    if (!result.ok) {
      return result;
    }

    if (!isHtmlContentType(result.contentType)) {
      return {
        ok: false,
        reason: 'content-type',
        error: `Unsupported content type "${result.contentType}"`,
        status: result.status,
        durationMs: result.durationMs,
      };
    }

    return { ...result, body: toText(result.body) };
  }

  async getText(url: string): Promise<HttpResult<string>> {
    const result = await this.request<string>(url, 'text');
    return result.ok ? { ...result, body: toText(result.body) } : result;
  }

  async getBinary(url: string): Promise<HttpResult<Uint8Array>> {
    const result = await this.request<ArrayBuffer>(url, 'arraybuffer');
    return result.ok ? { ...result, body: new Uint8Array(result.body) } : result;
  }

  async close(): Promise<void> {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private async request<T>(
    url: string,
    responseType: ResponseType,
  ): Promise<HttpResult<T>> {
    const startTime = Date.now();

    try {
      const response = await this.axiosInstance.get<T>(url, { responseType });
      const durationMs = Date.now() - startTime;

      if (response.status !== 200) {
        log.debug(`GET ${url} -> ${response.status}`);
        return {
          ok: false,
          reason: 'http-status',
          error: `HTTP ${response.status}`,
          status: response.status,
          durationMs,
        };
      }

      const finalUrl: unknown = response.request?.res?.responseUrl;

      return {
        ok: true,
        status: response.status,
        finalUrl: typeof finalUrl === 'string' ? finalUrl : url,
        contentType: readHeader(response.headers, 'content-type') ?? '',
        contentDisposition: readHeader(response.headers, 'content-disposition'),
        body: response.data,
        durationMs,
      };
    } catch (error) {
      const reason = classifyTransportError(error);
      log.debug(`GET ${url} failed (${reason}):`, errorMessage(error));

      return {
        ok: false,
        reason,
        error: errorMessage(error),
        durationMs: Date.now() - startTime,
      };
    }
  }
}

function toText(body: unknown): string {
  if (typeof body === 'string') {
    return body;
  }

  if (body instanceof Uint8Array) {
    return Buffer.from(body).toString('utf-8');
  }

  return body === undefined || body === null ? '' : String(body);
}

export { classifyTransportError };
export type { AxiosHttpClientConfig };
