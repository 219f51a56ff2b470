// src/services/calendar/http-client.ts
import axios, { type AxiosInstance, type Method } from 'axios';
import type { CalDavConfig } from '../../config/config.js';
import {
  AuthenticationFailedError,
  NotFoundError,
  RemoteConflictError,
  TransportError,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('http-client');

export interface HttpResult {
  status: number;
  statusText: string;
  data: string;
  etag?: string;
}

export interface HttpClientOptions {
  timeoutMs: number;
  /** Preconfigured axios instance; tests pass one with an in-process adapter */
  axiosInstance?: AxiosInstance;
}

interface RequestOptions {
  headers?: Record<string, string>;
  data?: string;
  signal?: AbortSignal;
}

/**
 * HTTP client for CalDAV servers using axios.
 *
 * Non-2xx statuses are returned rather than thrown, except 401/403 which always
 * become AuthenticationFailed. Network failures, timeouts and aborts become TransportError.
 */
export class HttpClient {
  private readonly authHeader: string;
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  readonly baseUrl: string;

  constructor(config: CalDavConfig, options: HttpClientOptions) {
    if (!config.serverUrl || !config.username || !config.password) {
      throw new Error('CalDAV configuration is incomplete');
    }

    this.baseUrl = config.serverUrl;
    this.timeoutMs = options.timeoutMs;
    this.http = options.axiosInstance ?? axios.create();

    const auth = Buffer.from(`${config.username}:${config.password}`).toString('base64');
    this.authHeader = `Basic ${auth}`;
  }

  /**
   * Resolves an href from a multistatus body against the server URL
   */
  resolveUrl(href: string): string {
    return new URL(href, this.baseUrl).toString();
  }

  /**
   * Performs a PROPFIND request
   */
  async propfind(url: string, depth: 0 | 1, data: string, signal?: AbortSignal): Promise<HttpResult> {
    return this.request('PROPFIND', url, {
      headers: { ...this.xmlHeaders(), Depth: String(depth) },
      data,
      signal,
    });
  }

  /**
   * Performs a REPORT request
   */
  async report(url: string, depth: 0 | 1, data: string, signal?: AbortSignal): Promise<HttpResult> {
    return this.request('REPORT', url, {
      headers: { ...this.xmlHeaders(), Depth: String(depth) },
      data,
      signal,
    });
  }

  /**
   * Performs a PUT of an iCalendar object
   */
  async put(
    url: string,
    data: string,
    conditions: { ifMatch?: string; ifNoneMatch?: string } = {},
    signal?: AbortSignal,
  ): Promise<HttpResult> {
    const headers: Record<string, string> = { 'Content-Type': 'text/calendar; charset=utf-8' };
    if (conditions.ifMatch) headers['If-Match'] = conditions.ifMatch;
    if (conditions.ifNoneMatch) headers['If-None-Match'] = conditions.ifNoneMatch;
    return this.request('PUT', url, { headers, data, signal });
  }

  /**
   * Performs a DELETE request
   */
  async delete(url: string, ifMatch?: string, signal?: AbortSignal): Promise<HttpResult> {
    return this.request('DELETE', url, {
      headers: ifMatch ? { 'If-Match': ifMatch } : {},
      signal,
    });
  }

  private xmlHeaders(): Record<string, string> {
    return { 'Content-Type': 'application/xml; charset=utf-8' };
  }

  private async request(method: Method | string, url: string, options: RequestOptions): Promise<HttpResult> {
    logger.debug(`${method} ${url}`);

    try {
      const response = await this.http.request<string>({
        method,
        url,
        data: options.data,
        headers: { Authorization: this.authHeader, ...options.headers },
        timeout: this.timeoutMs,
        signal: options.signal,
        responseType: 'text',
        transformResponse: (body: unknown) => body,
        validateStatus: () => true,
      });

      if (response.status === 401 || response.status === 403) {
        throw new AuthenticationFailedError(
          `CalDAV server rejected the credentials (${response.status} ${response.statusText})`,
        );
      }

      const etag: unknown = response.headers['etag'];
      return {
        status: response.status,
        statusText: response.statusText,
        data: typeof response.data === 'string' ? response.data : '',
        etag: typeof etag === 'string' ? etag : undefined,
      };
    } catch (error) {
      if (error instanceof AuthenticationFailedError) throw error;
      throw toTransportError(method, url, error);
    }
  }
}

function toTransportError(method: string, url: string, error: unknown): TransportError {
  if (axios.isCancel(error)) {
    return new TransportError(`${method} ${url} was cancelled`, { cancelled: true });
  }
  if (axios.isAxiosError(error)) {
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    logger.warn(`${method} ${url} failed: ${error.code ?? error.message}`);
    return new TransportError(
      timedOut ? `${method} ${url} timed out` : `${method} ${url} failed: ${error.message}`,
      { code: error.code, timedOut },
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`${method} ${url} failed: ${message}`);
}

/**
 * Maps a non-2xx status to the calendar error taxonomy
 */
export function ensureSuccess(result: HttpResult, context: string): HttpResult {
  if (result.status >= 200 && result.status < 300) return result;

  switch (result.status) {
    case 404:
    case 410:
      throw new NotFoundError(context);
    case 409:
    case 412:
      throw new RemoteConflictError(`${context}: server reported a conflict (${result.status})`, {
        status: result.status,
      });
    default:
      throw new TransportError(`${context}: HTTP ${result.status} ${result.statusText}`, {
        status: result.status,
      });
  }
}
