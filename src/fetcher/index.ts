export { Downloader, createDownloader, PARTIAL_SUFFIX } from './downloader.js';
export type { DownloaderOptions } from './downloader.js';
export { DownloadQueue } from './queue.js';
export { RetryPolicy, isRetryable } from './retry.js';
export type { RetryPolicyConfig } from './retry.js';
export { createHttpTransport } from './transport.js';
export type {
  Transport,
  TransportResponse,
  TransportRequestOptions,
  HttpTransportOptions,
} from './transport.js';
export { DownloadError } from '../errors.js';
