import { defaultConfig, loadConfig, mergeConfig } from '../config/loader.js';
import { PdfCrawler, type PdfCrawlerDeps } from '../crawler/pdf-crawler.js';
import { moduleLogger } from '../logger.js';
import type {
  CrawlOptions,
  CrawlResult,
  PdfHarvestConfig,
  PdfHarvestConfigInput,
} from '../types.js';
import { isValidHttpUrl } from '../url/index.js';

const log = moduleLogger('crawler');

/**
 * Everything needed for one crawl.
 */
export interface CrawlRequest extends CrawlOptions {
  url: string;
  /** Overrides applied on top of the file (or default) configuration. */
  config?: PdfHarvestConfigInput;
  /** JSON configuration file to start from instead of the defaults. */
  configPath?: string;
}

/**
 * Build the effective configuration for a request: the file at
 * `configPath` (or the defaults), with `config` deep-merged over it.
 *
 * @throws ConfigError when the file or the merged result is invalid
 */
export function resolveConfig(
  request: Pick<CrawlRequest, 'config' | 'configPath'> = {},
): PdfHarvestConfig {
  const base = request.configPath ? loadConfig(request.configPath) : defaultConfig();
  return request.config ? mergeConfig(base, request.config) : base;
}

function validateRequest(request: CrawlRequest): void {
  if (request.url.trim() === '') {
    log.warn('No URL given; the crawl will fail to load a page');
  } else if (!isValidHttpUrl(request.url.trim())) {
    log.warn({ url: request.url }, 'URL is not an absolute http(s) URL; results may be empty');
  }
  if (request.filterMode === 'keyword' && (request.keywords ?? []).length === 0) {
    log.warn('Keyword filter without keywords drops every link');
  }
}

/**
 * Crawl one page for PDF links, download the matches and optionally merge
 * them.
 *
 * @example
 * ```ts
 * const result = await crawl({ url: 'https://example.com/reports', filterMode: 'prefix' });
 * console.log(result.pdfDownloaded);
 * ```
 *
 * An empty or malformed `url` is logged and yields an unsuccessful result.
 *
 * @throws ConfigError if configuration is invalid
 */
export async function crawl(request: CrawlRequest, deps: PdfCrawlerDeps = {}): Promise<CrawlResult> {
  validateRequest(request);
  const config = resolveConfig(request);
  const { url, filterMode, keywords, merge, onCandidatesFound, onDownloadComplete } = request;
  return new PdfCrawler(config, deps).crawl(url.trim(), {
    filterMode,
    keywords,
    merge,
    onCandidatesFound,
    onDownloadComplete,
  });
}

export default crawl;

// Re-export building blocks for advanced usage
export { PdfCrawler } from '../crawler/pdf-crawler.js';
export type { PdfCrawlerDeps } from '../crawler/pdf-crawler.js';
export {
  discoverPdfLinks,
  discoverPdfLinksDirect,
  filterCandidates,
  formatReport,
  saveReport,
} from '../crawler/index.js';
export {
  PdfMerger,
  mergePdfs,
  mergeDirectory,
  getMergeInfo,
  findMergeCandidates,
  DEFAULT_MERGE_NAME,
} from '../merger/index.js';
export type { MergeInfo, MergeOptions, MergeDirectoryOptions } from '../merger/index.js';
export { Downloader, createDownloader, createHttpTransport, RetryPolicy } from '../fetcher/index.js';
export type { Transport, TransportResponse } from '../fetcher/index.js';
export { openPageSession } from '../browser/index.js';
export type { PageSession, DomElement, PageSessionOptions } from '../browser/index.js';
export {
  loadConfig,
  parseConfig,
  saveConfig,
  mergeConfig,
  defaultConfig,
  generateDynamicConfig,
  generateRandomUserAgent,
  generateSmartHeaders,
  applyConfigTemplate,
  CONFIG_TEMPLATES,
} from '../config/index.js';
export {
  normalizeUrl,
  isPdfUrl,
  extractFilename,
  sanitizeFilename,
  isValidHttpUrl,
  validatePdfUrl,
  checkUrlAccessible,
  hostFolderName,
} from '../url/index.js';
export { ConfigError, DownloadError, SessionError } from '../errors.js';
export { setLogLevel } from '../logger.js';
export type {
  CrawlOptions,
  CrawlResult,
  DownloadResult,
  DownloadStatus,
  DownloadTask,
  DiscoveryMethod,
  FilterMode,
  MergeAfterDownload,
  MergeResult,
  PdfHarvestConfig,
  PdfHarvestConfigInput,
  PdfLinkCandidate,
} from '../types.js';
