import { Agent, fetch } from 'undici';

import { DownloadError, errorMessage } from '../errors.js';

/**
 * Response returned by a {@link Transport}. The body is consumed at most once.
 */
export interface TransportResponse {
  statusCode: number;
  /** Final URL after redirects. */
  url: string;
  /** Lower-cased header names. */
  headers: Record<string, string>;
  body: AsyncIterable<Uint8Array> | null;
  /** Release an unread body so the connection can be reused. */
  discard?(): Promise<void>;
}

export interface TransportRequestOptions {
  headers?: Record<string, string>;
}

/**
 * Minimal HTTP client used for downloads and accessibility checks.
 * Implementations reject with {@link DownloadError} on network failure but
 * resolve for every HTTP status; callers decide what a status means.
 */
export interface Transport {
  get(url: string, options?: TransportRequestOptions): Promise<TransportResponse>;
  head(url: string, options?: TransportRequestOptions): Promise<TransportResponse>;
  close(): Promise<void>;
}

export interface HttpTransportOptions {
  /** Connect, header and body-stall timeout in milliseconds. */
  timeoutMs: number;
  verifySsl: boolean;
  userAgent: string;
  headers?: Record<string, string>;
}

/**
 * Create an undici-backed transport. Redirects are followed.
 */
export function createHttpTransport(options: HttpTransportOptions): Transport {
  const agent = new Agent({
    connect: { timeout: options.timeoutMs, rejectUnauthorized: options.verifySsl },
    headersTimeout: options.timeoutMs,
    bodyTimeout: options.timeoutMs,
  });

  const defaultHeaders: Record<string, string> = {
    ...(options.headers ?? {}),
    'User-Agent': options.userAgent,
  };

  async function request(
    method: 'GET' | 'HEAD',
    url: string,
    requestOptions: TransportRequestOptions = {},
  ): Promise<TransportResponse> {
    try {
      const response = await fetch(url, {
        method,
        headers: { ...defaultHeaders, ...(requestOptions.headers ?? {}) },
        redirect: 'follow',
        dispatcher: agent,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        statusCode: response.status,
        url: response.url || url,
        headers,
        body: response.body,
        discard: async () => {
          await response.body?.cancel();
        },
      };
    } catch (error) {
      const cause = error instanceof Error && error.cause instanceof Error ? error.cause : undefined;
      const detail = cause ? `${errorMessage(error)} (${cause.message})` : errorMessage(error);
      throw new DownloadError(`Network error requesting ${url}: ${detail}`, url);
    }
  }

  return {
    get: (url, requestOptions) => request('GET', url, requestOptions),
    head: (url, requestOptions) => request('HEAD', url, requestOptions),
    close: () => agent.close(),
  };
}
