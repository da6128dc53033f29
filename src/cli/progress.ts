import type { MergeInfo } from '../merger/index.js';
import type {
  CrawlResult,
  DownloadResult,
  FilterMode,
  MergeResult,
  PdfHarvestConfig,
  PdfLinkCandidate,
} from '../types.js';

/**
 * Output verbosity level for the CLI.
 */
export type Verbosity = 'normal' | 'verbose' | 'quiet';

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

/**
 * Create event callback handlers for progress display during a crawl.
 *
 * Progress goes to stderr so it does not interfere with stdout output.
 *
 * - quiet mode: failures only
 * - normal mode: candidate count and one line per finished download
 * - verbose mode: also every candidate URL and download sizes
 */
export function createProgressCallbacks(verbosity: Verbosity): {
  onCandidatesFound: (candidates: PdfLinkCandidate[]) => void;
  onDownloadComplete: (result: DownloadResult) => void;
} {
  let total = 0;
  let finished = 0;

  return {
    onCandidatesFound: (candidates: PdfLinkCandidate[]) => {
      total = candidates.length;
      if (verbosity === 'quiet') return;
      process.stderr.write(`Found ${candidates.length} PDF links\n`);
      if (verbosity === 'verbose') {
        for (const candidate of candidates) {
          process.stderr.write(`  ${candidate.url} (${candidate.discoveryMethod})\n`);
        }
      }
    },

    onDownloadComplete: (result: DownloadResult) => {
      finished++;
      const position = total > 0 ? `[${finished}/${total}]` : `[${finished}]`;
      if (!result.success) {
        process.stderr.write(
          `${position} Failed: ${result.filename} - ${result.errorMessage ?? 'unknown error'}\n`,
        );
        return;
      }
      if (verbosity === 'quiet') return;

      const label = result.status === 'already_exists' ? 'Exists' : 'Saved';
      if (verbosity === 'verbose') {
        process.stderr.write(
          `${position} ${label}: ${result.filename} (${formatBytes(result.sizeBytes ?? 0)}, ${(result.elapsedSeconds ?? 0).toFixed(2)}s)\n`,
        );
      } else {
        process.stderr.write(`${position} ${label}: ${result.filename}\n`);
      }
    },
  };
}

/**
 * Print a summary of the crawl results to stderr.
 */
export function printSummary(result: CrawlResult, verbosity: Verbosity): void {
  if (verbosity === 'quiet') {
    for (const error of result.errors) {
      process.stderr.write(`Error: ${error}\n`);
    }
    return;
  }

  process.stderr.write('\n');
  process.stderr.write(
    `Done! Found ${result.pdfLinksFound} PDF links, ${result.pdfLinksFiltered} after filter, ` +
      `downloaded ${result.pdfDownloaded} in ${result.executionSeconds.toFixed(1)}s\n`,
  );
  process.stderr.write(`Output: ${result.downloadDir}\n`);

  if (result.merge) {
    printMergeResult(result.merge, verbosity);
  }
  for (const error of result.errors) {
    process.stderr.write(`Error: ${error}\n`);
  }
}

/**
 * Print the outcome of a merge to stderr.
 */
export function printMergeResult(result: MergeResult, verbosity: Verbosity): void {
  if (!result.success) {
    process.stderr.write(`Merge failed: ${result.error ?? 'unknown error'}\n`);
    return;
  }
  if (verbosity === 'quiet') return;

  process.stderr.write(
    `Merged ${result.filesMerged ?? 0} files (${result.totalPages ?? 0} pages) into ${result.outputFile ?? ''}` +
      ` (${(result.outputSizeMb ?? 0).toFixed(2)} MB)\n`,
  );
  if (result.deletedOriginals) {
    process.stderr.write(`Deleted ${result.deletedFiles.length} original files\n`);
  }
}

/**
 * Print what a merge would combine, without merging.
 */
export function printMergeInfo(files: string[], info: MergeInfo): void {
  process.stderr.write(`Files: ${info.totalFiles} (${info.validFiles} readable)\n`);
  for (const file of files) {
    process.stderr.write(`  ${file}\n`);
  }
  process.stderr.write(`Total pages: ${info.totalPages}\n`);
  process.stderr.write(`Total size: ${info.totalSizeMb.toFixed(2)} MB\n`);
  process.stderr.write(`Estimated output size: ${info.estimatedOutputSizeMb.toFixed(2)} MB\n`);
}

/**
 * Print dry-run information showing what a crawl would do.
 */
export function printDryRun(
  url: string,
  config: PdfHarvestConfig,
  selection: { filterMode: FilterMode; keywords: string[]; merge: boolean },
): void {
  process.stderr.write('\n--- Dry Run ---\n');
  process.stderr.write(`URL: ${url}\n`);
  process.stderr.write(`Filter: ${selection.filterMode}\n`);
  if (selection.keywords.length > 0) {
    process.stderr.write(`Keywords: ${selection.keywords.join(', ')}\n`);
  }
  process.stderr.write(`Engine: ${config.browser.engine}${config.browser.headless ? '' : ' (headed)'}\n`);
  process.stderr.write(`Output: ${config.output.baseDir}\n`);
  process.stderr.write(`Per-site subfolder: ${config.output.createSubfolder}\n`);
  process.stderr.write(`Workers: ${config.download.maxWorkers}\n`);
  process.stderr.write(`Verify TLS: ${config.network.verifySsl}\n`);
  process.stderr.write(`User-Agent: ${config.network.userAgent}\n`);
  process.stderr.write(`Merge after download: ${selection.merge}\n`);
  process.stderr.write('--- Nothing will be downloaded ---\n');
}
