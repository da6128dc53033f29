import {
  resolveSessionFactory,
  sessionOptionsFromConfig,
  type PageSession,
  type PageSessionFactory,
} from '../browser/index.js';
import { errorMessage, SessionError } from '../errors.js';
import { createDownloader } from '../fetcher/downloader.js';
import { createHttpTransport, type Transport } from '../fetcher/transport.js';
import { moduleLogger } from '../logger.js';
import { mergeDirectory } from '../merger/index.js';
import { resolveDownloadDir } from '../output/index.js';
import type { CrawlOptions, CrawlResult, DownloadTask, PdfHarvestConfig } from '../types.js';
import { filterCandidates } from './filter.js';
import { discoverPdfLinks, discoverPdfLinksDirect } from './link-discovery.js';

const log = moduleLogger('crawler');

/**
 * Collaborators that tests replace. Anything omitted is built from
 * configuration.
 */
export interface PdfCrawlerDeps {
  openSession?: PageSessionFactory;
  transport?: Transport;
}

/**
 * Runs one crawl end to end: load the page, discover and filter PDF
 * links, download them, and optionally merge the downloads.
 */
export class PdfCrawler {
  constructor(
    private readonly config: PdfHarvestConfig,
    private readonly deps: PdfCrawlerDeps = {},
  ) {}

  /**
   * Crawl `url` for PDF links.
   *
   * Never rejects for expected failures: a page that fails to load or any
   * other error ends the crawl with the message in `errors`. The page
   * session is closed on every path and `executionSeconds` is always set.
   */
  async crawl(url: string, options: CrawlOptions = {}): Promise<CrawlResult> {
    const started = performance.now();
    const filterMode = options.filterMode ?? 'all';
    const keywords = options.keywords ?? [];
    const downloadDir = resolveDownloadDir(this.config, url);

    const result: CrawlResult = {
      url,
      success: false,
      filterMode,
      keywords,
      downloadDir,
      pdfLinksFound: 0,
      pdfLinksFiltered: 0,
      pdfDownloaded: 0,
      downloads: [],
      errors: [],
      executionSeconds: 0,
    };

    log.info({ url, filterMode, keywords }, 'Starting crawl');

    let session: PageSession | undefined;
    let ownedTransport: Transport | undefined;

    try {
      const openSession =
        this.deps.openSession ?? (await resolveSessionFactory(this.config.browser.engine));
      session = await openSession(sessionOptionsFromConfig(this.config));

      if (!(await session.navigateTo(url))) {
        throw new SessionError(`Unable to load page: ${url}`, url);
      }
      await session.awaitSettled();

      let candidates = await discoverPdfLinks(session);
      if (candidates.length === 0) {
        log.info('No PDF links found, retrying with direct queries');
        candidates = await discoverPdfLinksDirect(session);
      }
      result.pdfLinksFound = candidates.length;
      options.onCandidatesFound?.(candidates);

      const filtered = filterCandidates(candidates, filterMode, keywords);
      result.pdfLinksFiltered = filtered.length;

      if (filtered.length === 0) {
        log.info('No PDF links left to download');
      } else {
        let transport = this.deps.transport;
        if (!transport) {
          ownedTransport = createHttpTransport({
            timeoutMs: this.config.download.timeout * 1000,
            verifySsl: this.config.network.verifySsl,
            userAgent: this.config.network.userAgent,
            headers: this.config.network.headers,
          });
          transport = ownedTransport;
        }

        const downloader = createDownloader(
          this.config,
          downloadDir,
          transport,
          options.onDownloadComplete,
        );
        const tasks: DownloadTask[] = filtered.map((c) => ({ url: c.url, filename: c.filename }));
        result.downloads = await downloader.downloadBatch(tasks, this.config.download.maxWorkers);
        result.pdfDownloaded = result.downloads.filter((d) => d.success).length;
      }

      result.success = true;
      log.info(
        { found: result.pdfLinksFound, filtered: result.pdfLinksFiltered, downloaded: result.pdfDownloaded },
        'Crawl finished',
      );
    } catch (error) {
      const message = `Crawl failed: ${errorMessage(error)}`;
      log.error({ url, err: errorMessage(error) }, 'Crawl failed');
      result.errors.push(message);
    } finally {
      if (session) {
        await session.close();
      }
      if (ownedTransport) {
        await closeTransport(ownedTransport);
      }
    }

    if (result.success && options.merge && result.pdfDownloaded > 0) {
      try {
        result.merge = await mergeDirectory(downloadDir, {
          outputName: options.merge.outputName,
          deleteOriginals: options.merge.deleteOriginals,
          filterMode,
          keywords,
        });
      } catch (error) {
        log.error({ downloadDir, err: errorMessage(error) }, 'Merge failed');
        result.merge = {
          success: false,
          error: errorMessage(error),
          deletedOriginals: false,
          deletedFiles: [],
        };
      }
      if (!result.merge.success && result.merge.error) {
        result.errors.push(`Merge failed: ${result.merge.error}`);
      }
    }

    result.executionSeconds = (performance.now() - started) / 1000;
    return result;
  }
}

async function closeTransport(transport: Transport): Promise<void> {
  try {
    await transport.close();
  } catch (error) {
    log.warn({ err: errorMessage(error) }, 'Failed to close HTTP transport');
  }
}

/**
 * Crawl `url` with a one-off {@link PdfCrawler}.
 */
export function crawlPdfs(
  config: PdfHarvestConfig,
  url: string,
  options: CrawlOptions = {},
  deps: PdfCrawlerDeps = {},
): Promise<CrawlResult> {
  return new PdfCrawler(config, deps).crawl(url, options);
}
