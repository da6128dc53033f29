import type { PdfHarvestConfig } from './config/schema.js';

export type { PdfHarvestConfig };

/**
 * Candidate selection policy applied before download.
 */
export type FilterMode = 'all' | 'prefix' | 'keyword';

export const FILTER_MODES: readonly FilterMode[] = ['all', 'prefix', 'keyword'];

/**
 * Which heuristic found a candidate.
 */
export type DiscoveryMethod =
  | 'href-text-match'
  | 'href-extension-match'
  | 'element-text-match';

/**
 * A link believed to reference a PDF, prior to filtering.
 */
export interface PdfLinkCandidate {
  /** Absolute http(s) URL. */
  url: string;
  /** Display text of the link, possibly empty. */
  text: string;
  /** Suggested filesystem-safe local filename. */
  filename: string;
  discoveryMethod: DiscoveryMethod;
}

export interface DownloadTask {
  url: string;
  filename: string;
}

export type DownloadStatus = 'completed' | 'already_exists' | 'failed';

export interface DownloadResult {
  readonly success: boolean;
  readonly url: string;
  readonly filename: string;
  readonly filepath?: string;
  readonly sizeBytes?: number;
  readonly elapsedSeconds?: number;
  readonly status: DownloadStatus;
  readonly errorMessage?: string;
}

export interface MergeResult {
  success: boolean;
  outputFile?: string;
  totalPages?: number;
  filesMerged?: number;
  outputSizeMb?: number;
  deletedOriginals: boolean;
  deletedFiles: string[];
  error?: string;
}

/**
 * Aggregate outcome of one crawl invocation.
 */
export interface CrawlResult {
  url: string;
  success: boolean;
  filterMode: FilterMode;
  keywords: string[];
  downloadDir: string;
  pdfLinksFound: number;
  pdfLinksFiltered: number;
  pdfDownloaded: number;
  downloads: DownloadResult[];
  errors: string[];
  executionSeconds: number;
  merge?: MergeResult;
}

/**
 * Merge-after-download settings for a crawl.
 */
export interface MergeAfterDownload {
  outputName: string;
  deleteOriginals: boolean;
}

export interface CrawlOptions {
  filterMode?: FilterMode;
  keywords?: string[];
  merge?: MergeAfterDownload;

  // Events
  onCandidatesFound?: (candidates: PdfLinkCandidate[]) => void;
  onDownloadComplete?: (result: DownloadResult) => void;
}

/**
 * Convenience alias for partially specified configuration input.
 */
export type PdfHarvestConfigInput = DeepPartial<PdfHarvestConfig>;

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Record<string, unknown> ? DeepPartial<T[K]> : T[K];
};

