import { DownloadError, errorMessage } from '../errors.js';
import { RetryPolicy } from '../fetcher/retry.js';
import type { Transport } from '../fetcher/transport.js';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('url');

/**
 * Result of a HEAD probe against a URL.
 */
export interface UrlAccessibility {
  accessible: boolean;
  statusCode: number | null;
  contentType: string;
  contentLength: number | null;
  isPdf: boolean;
  finalUrl: string;
  error?: string;
}

export interface CheckUrlOptions {
  retry?: RetryPolicy;
}

/**
 * Probe a URL with a HEAD request, retrying transient failures.
 *
 * Only a 200 response counts as accessible. Never throws: a request that
 * fails on every attempt is reported with `error` set.
 */
export async function checkUrlAccessible(
  url: string,
  transport: Transport,
  options: CheckUrlOptions = {},
): Promise<UrlAccessibility> {
  const retry =
    options.retry ?? new RetryPolicy({ attempts: 3, baseDelayMs: 2000, maxDelayMs: 10_000 });

  try {
    const response = await retry.execute(async () => {
      const res = await transport.head(url);
      if (res.statusCode >= 500 || res.statusCode === 429) {
        throw new DownloadError(`HTTP ${res.statusCode} for ${url}`, url, res.statusCode);
      }
      return res;
    }, url);

    const contentType = response.headers['content-type'] ?? '';
    const lengthHeader = response.headers['content-length'];
    const contentLength = lengthHeader !== undefined ? Number(lengthHeader) : NaN;

    const result: UrlAccessibility = {
      accessible: response.statusCode === 200,
      statusCode: response.statusCode,
      contentType,
      contentLength: Number.isFinite(contentLength) ? contentLength : null,
      isPdf: contentType.toLowerCase().includes('pdf'),
      finalUrl: response.url,
    };
    log.debug({ url, result }, 'URL check finished');
    return result;
  } catch (error) {
    const statusCode = error instanceof DownloadError ? (error.statusCode ?? null) : null;
    log.warn({ url, err: errorMessage(error) }, 'URL check failed');
    return {
      accessible: false,
      statusCode,
      contentType: '',
      contentLength: null,
      isPdf: false,
      finalUrl: url,
      error: errorMessage(error),
    };
  }
}
