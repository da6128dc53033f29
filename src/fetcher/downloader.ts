import { createWriteStream } from 'node:fs';
import { rename } from 'node:fs/promises';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { DownloadError, errorMessage } from '../errors.js';
import { moduleLogger } from '../logger.js';
import { ensureDir, fileExists, fileSize, removeFile } from '../output/index.js';
import type { DownloadResult, DownloadTask, PdfHarvestConfig } from '../types.js';
import { DownloadQueue } from './queue.js';
import { RetryPolicy } from './retry.js';
import type { Transport, TransportResponse } from './transport.js';

const log = moduleLogger('downloader');

/** Suffix of the temporary file a download streams into. */
export const PARTIAL_SUFFIX = '.part';

export interface DownloaderOptions {
  /** Directory that receives downloaded files. */
  downloadDir: string;
  transport: Transport;
  chunkSize: number;
  overwriteExisting: boolean;
  retry: RetryPolicy;
  /** Called after each task settles, in completion order. */
  onResult?: (result: DownloadResult) => void;
}

/**
 * Downloads files over a {@link Transport} with retry, skip-if-exists
 * and per-file failure isolation.
 */
export class Downloader {
  private readonly options: DownloaderOptions;

  constructor(options: DownloaderOptions) {
    this.options = options;
  }

  get downloadDir(): string {
    return this.options.downloadDir;
  }

  /**
   * Download one file into the download directory.
   *
   * An existing destination file is kept and reported as `already_exists`
   * without any network call, unless `overwriteExisting` is set. Failures
   * remove the partial file and are returned as `failed`; this method
   * does not throw.
   */
  async downloadOne(url: string, filename: string): Promise<DownloadResult> {
    const filepath = join(this.options.downloadDir, filename);

    if (!this.options.overwriteExisting && fileExists(filepath)) {
      log.info({ filename }, 'File already exists, skipping');
      return {
        success: true,
        url,
        filename,
        filepath,
        sizeBytes: await fileSize(filepath),
        elapsedSeconds: 0,
        status: 'already_exists',
      };
    }

    const started = performance.now();
    const partialPath = filepath + PARTIAL_SUFFIX;

    try {
      await ensureDir(this.options.downloadDir);
      await this.options.retry.execute(async (attempt) => {
        log.debug({ url, attempt }, 'Downloading');
        try {
          await this.fetchToFile(url, partialPath);
        } catch (error) {
          await removeFile(partialPath);
          throw error;
        }
      }, url);
      await rename(partialPath, filepath);

      const sizeBytes = await fileSize(filepath);
      const elapsedSeconds = (performance.now() - started) / 1000;
      log.info({ filename, sizeBytes, elapsedSeconds }, 'Download completed');

      return {
        success: true,
        url,
        filename,
        filepath,
        sizeBytes,
        elapsedSeconds,
        status: 'completed',
      };
    } catch (error) {
      await removeFile(partialPath);
      const message = errorMessage(error);
      log.error({ url, filename, err: message }, 'Download failed');
      return {
        success: false,
        url,
        filename,
        elapsedSeconds: (performance.now() - started) / 1000,
        status: 'failed',
        errorMessage: message,
      };
    }
  }

  /**
   * Download every task with at most `maxWorkers` running at once.
   * Results are returned in completion order.
   */
  async downloadBatch(tasks: DownloadTask[], maxWorkers: number): Promise<DownloadResult[]> {
    const queue = new DownloadQueue(maxWorkers);
    const results: DownloadResult[] = [];
    const started = performance.now();

    await Promise.all(
      tasks.map((task) =>
        queue.add(async () => {
          const result = await this.runTask(task);
          results.push(result);
          this.options.onResult?.(result);
        }),
      ),
    );

    const succeeded = results.filter((r) => r.success).length;
    const totalBytes = results.reduce((sum, r) => sum + (r.sizeBytes ?? 0), 0);
    log.info(
      {
        total: tasks.length,
        succeeded,
        failed: results.length - succeeded,
        totalBytes,
        elapsedSeconds: (performance.now() - started) / 1000,
      },
      'Batch download finished',
    );

    return results;
  }

  private async runTask(task: DownloadTask): Promise<DownloadResult> {
    try {
      return await this.downloadOne(task.url, task.filename);
    } catch (error) {
      return {
        success: false,
        url: task.url,
        filename: task.filename,
        status: 'failed',
        errorMessage: errorMessage(error),
      };
    }
  }

  private async fetchToFile(url: string, destination: string): Promise<void> {
    const response = await this.options.transport.get(url);

    if (response.statusCode < 200 || response.statusCode >= 300) {
      await discardBody(response, url);
      throw new DownloadError(`HTTP ${response.statusCode} for ${url}`, url, response.statusCode);
    }
    if (!response.body) {
      throw new DownloadError(`Empty response body for ${url}`, url, response.statusCode);
    }

    try {
      await pipeline(
        Readable.from(response.body),
        createWriteStream(destination, { highWaterMark: this.options.chunkSize }),
      );
    } catch (error) {
      if (error instanceof DownloadError) throw error;
      throw new DownloadError(`Transfer of ${url} failed: ${errorMessage(error)}`, url);
    }
  }
}

async function discardBody(response: TransportResponse, url: string): Promise<void> {
  try {
    await response.discard?.();
  } catch (error) {
    log.debug({ url, err: errorMessage(error) }, 'Failed to discard response body');
  }
}

/**
 * Build a downloader from configuration.
 */
export function createDownloader(
  config: PdfHarvestConfig,
  downloadDir: string,
  transport: Transport,
  onResult?: (result: DownloadResult) => void,
): Downloader {
  return new Downloader({
    downloadDir,
    transport,
    chunkSize: config.download.chunkSize,
    overwriteExisting: config.output.overwriteExisting,
    retry: new RetryPolicy({
      attempts: config.download.retryCount,
      baseDelayMs: config.download.retryBaseDelayMs,
      maxDelayMs: config.download.retryMaxDelayMs,
    }),
    onResult,
  });
}
