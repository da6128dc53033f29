import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { moduleLogger } from '../logger.js';
import { fileTimestamp } from '../output/index.js';
import type { CrawlResult, DownloadResult } from '../types.js';

const log = moduleLogger('crawler');

const RULE = '='.repeat(60);
const SUB_RULE = '-'.repeat(40);

function downloadLines(download: DownloadResult): string[] {
  const lines = [`[${download.success ? 'OK' : 'FAILED'}] ${download.filename}`];
  if (download.success) {
    lines.push(`    Path: ${download.filepath ?? 'N/A'}`);
    lines.push(`    Size: ${download.sizeBytes ?? 0} bytes`);
    lines.push(`    Time: ${(download.elapsedSeconds ?? 0).toFixed(2)} s`);
    if (download.status === 'already_exists') {
      lines.push('    Note: already existed, not downloaded again');
    }
  } else {
    lines.push(`    Error: ${download.errorMessage ?? 'N/A'}`);
  }
  lines.push('');
  return lines;
}

/**
 * Render a crawl result as a plain-text report.
 */
export function formatReport(result: CrawlResult): string {
  const lines: string[] = [
    RULE,
    'PDF Crawl Report',
    RULE,
    `Target URL: ${result.url}`,
    `Execution time: ${result.executionSeconds.toFixed(2)} s`,
    `Status: ${result.success ? 'success' : 'failed'}`,
    `Filter: ${result.filterMode}${result.keywords.length > 0 ? ` (${result.keywords.join(', ')})` : ''}`,
    `Download directory: ${result.downloadDir}`,
    `PDF links found: ${result.pdfLinksFound}`,
    `PDF links after filter: ${result.pdfLinksFiltered}`,
    `Downloaded: ${result.pdfDownloaded}`,
    '',
  ];

  if (result.downloads.length > 0) {
    lines.push('Downloads:', SUB_RULE);
    for (const download of result.downloads) {
      lines.push(...downloadLines(download));
    }
  }

  if (result.merge) {
    lines.push('Merge:', SUB_RULE);
    if (result.merge.success) {
      lines.push(`Output: ${result.merge.outputFile ?? 'N/A'}`);
      lines.push(`Files merged: ${result.merge.filesMerged ?? 0}`);
      lines.push(`Total pages: ${result.merge.totalPages ?? 0}`);
      lines.push(`Output size: ${(result.merge.outputSizeMb ?? 0).toFixed(2)} MB`);
      if (result.merge.deletedOriginals) {
        lines.push(`Originals deleted: ${result.merge.deletedFiles.length}`);
      }
    } else {
      lines.push(`[FAILED] ${result.merge.error ?? 'unknown error'}`);
    }
    lines.push('');
  }

  if (result.errors.length > 0) {
    lines.push('Errors:', SUB_RULE);
    for (const error of result.errors) {
      lines.push(`[ERROR] ${error}`);
    }
  }

  lines.push(RULE);
  return lines.join('\n');
}

/**
 * Write the report for `result` to `outputPath`, or to
 * `crawl_report_<YYYYMMDD_HHMMSS>.txt` in the working directory.
 *
 * @returns The absolute path written
 */
export async function saveReport(
  result: CrawlResult,
  outputPath?: string,
  now: Date = new Date(),
): Promise<string> {
  const target = resolve(outputPath ?? `crawl_report_${fileTimestamp(now)}.txt`);
  await writeFile(target, formatReport(result) + '\n', 'utf-8');
  log.info({ path: target }, 'Report saved');
  return target;
}
