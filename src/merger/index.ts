import { existsSync, statSync } from 'node:fs';
import { readFile, rm, stat, writeFile } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import { EncryptedPDFError, PDFDocument } from 'pdf-lib';

import { matchesFilter } from '../crawler/filter.js';
import { errorMessage } from '../errors.js';
import { moduleLogger } from '../logger.js';
import { collectFiles, ensureDir, fileSize } from '../output/index.js';
import type { FilterMode, MergeResult } from '../types.js';

const log = moduleLogger('merger');

export const DEFAULT_MERGE_NAME = 'merged_pdfs';

const BYTES_PER_MB = 1024 * 1024;

/** Ratio of merged size to summed input size used for estimates. */
const OUTPUT_SIZE_RATIO = 0.95;

export interface MergeOptions {
  /** Output filename without extension. */
  outputName?: string;
  /** Delete every merged source after the output is written. */
  deleteOriginals?: boolean;
}

export interface MergeDirectoryOptions extends MergeOptions {
  filterMode?: FilterMode;
  keywords?: string[];
}

/**
 * Summary of a prospective merge.
 */
export interface MergeInfo {
  totalFiles: number;
  /** Readable, non-encrypted PDFs. */
  validFiles: number;
  totalPages: number;
  totalSizeMb: number;
  estimatedOutputSizeMb: number;
}

function isPdfPath(path: string): boolean {
  return extname(path).toLowerCase() === '.pdf';
}

function isExistingPdf(path: string): boolean {
  if (!isPdfPath(path) || !existsSync(path)) return false;
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

type LoadOutcome =
  | { kind: 'loaded'; doc: PDFDocument }
  | { kind: 'encrypted' }
  | { kind: 'unreadable'; error: string };

async function loadPdf(path: string): Promise<LoadOutcome> {
  try {
    const bytes = await readFile(path);
    return { kind: 'loaded', doc: await PDFDocument.load(bytes) };
  } catch (error) {
    if (error instanceof EncryptedPDFError) {
      return { kind: 'encrypted' };
    }
    return { kind: 'unreadable', error: errorMessage(error) };
  }
}

function failure(error: string): MergeResult {
  return { success: false, error, deletedOriginals: false, deletedFiles: [] };
}

/**
 * Concatenates PDF files with pdf-lib, writing results into one output
 * directory.
 */
export class PdfMerger {
  readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = resolve(outputDir);
  }

  /**
   * Merge `filePaths` in order into `<outputDir>/<outputName>.pdf`.
   *
   * Paths that do not exist or lack a `.pdf` extension are ignored.
   * Encrypted and unreadable files are skipped. Fails when no file
   * contributes a page. Source deletion happens only after the output is
   * written, one file at a time; a failed delete is logged.
   */
  async mergePdfs(filePaths: string[], options: MergeOptions = {}): Promise<MergeResult> {
    const outputName = options.outputName || DEFAULT_MERGE_NAME;
    const deleteOriginals = options.deleteOriginals ?? true;

    if (filePaths.length === 0) {
      return failure('No PDF files to merge');
    }

    const valid = filePaths.filter((path) => {
      const ok = isExistingPdf(path);
      if (!ok) log.warn({ path }, 'Skipping missing or non-PDF file');
      return ok;
    });
    if (valid.length === 0) {
      return failure('No valid PDF files found');
    }

    const outputFile = join(this.outputDir, `${outputName}.pdf`);

    try {
      const merged = await PDFDocument.create();
      const mergedSources: string[] = [];
      let totalPages = 0;

      log.info({ count: valid.length }, 'Merging PDF files');
      for (const [index, path] of valid.entries()) {
        log.debug({ file: basename(path), position: index + 1, of: valid.length }, 'Reading PDF');
        const outcome = await loadPdf(path);
        if (outcome.kind === 'encrypted') {
          log.warn({ path }, 'PDF is encrypted, skipping');
          continue;
        }
        if (outcome.kind === 'unreadable') {
          log.error({ path, err: outcome.error }, 'Failed to read PDF, skipping');
          continue;
        }

        const pages = await merged.copyPages(outcome.doc, outcome.doc.getPageIndices());
        pages.forEach((page) => merged.addPage(page));
        totalPages += pages.length;
        if (pages.length > 0) mergedSources.push(path);
      }

      if (totalPages === 0) {
        return failure('No pages could be read from the input PDFs');
      }

      await ensureDir(this.outputDir);
      await writeFile(outputFile, await merged.save());
      const outputSizeMb = (await fileSize(outputFile)) / BYTES_PER_MB;
      log.info({ outputFile, totalPages, files: mergedSources.length }, 'PDF merge completed');

      const deletedFiles = deleteOriginals ? await deleteSources(mergedSources, outputFile) : [];

      return {
        success: true,
        outputFile,
        totalPages,
        filesMerged: mergedSources.length,
        outputSizeMb,
        deletedOriginals: deleteOriginals,
        deletedFiles,
      };
    } catch (error) {
      const message = `PDF merge failed: ${errorMessage(error)}`;
      log.error({ outputFile, err: errorMessage(error) }, 'PDF merge failed');
      return failure(message);
    }
  }

  /**
   * Merge every PDF under `dir` (recursively) that passes the filter,
   * in lexicographic path order. The filter sees the file name only.
   */
  async mergeDirectory(dir: string, options: MergeDirectoryOptions = {}): Promise<MergeResult> {
    const files = await findMergeCandidates(dir, options);
    if (files === undefined) {
      return failure(`Directory does not exist: ${dir}`);
    }

    const outputFile = join(this.outputDir, `${options.outputName || DEFAULT_MERGE_NAME}.pdf`);
    const inputs = files.filter((path) => resolve(path) !== outputFile);
    if (inputs.length === 0) {
      return failure(`No matching PDF files found in ${dir}`);
    }

    log.info({ dir, count: inputs.length }, 'Found PDF files to merge');
    return this.mergePdfs(inputs, options);
  }

  /**
   * Count pages and size of the readable, non-encrypted files among
   * `filePaths` without writing anything.
   */
  async getMergeInfo(filePaths: string[]): Promise<MergeInfo> {
    let validFiles = 0;
    let totalPages = 0;
    let totalSize = 0;

    for (const path of filePaths) {
      if (!isExistingPdf(path)) continue;
      const outcome = await loadPdf(path);
      if (outcome.kind !== 'loaded') {
        if (outcome.kind === 'unreadable') log.warn({ path, err: outcome.error }, 'Cannot read PDF');
        continue;
      }
      validFiles++;
      totalPages += outcome.doc.getPageCount();
      totalSize += (await stat(path)).size;
    }

    const totalSizeMb = totalSize / BYTES_PER_MB;
    return {
      totalFiles: filePaths.length,
      validFiles,
      totalPages,
      totalSizeMb,
      estimatedOutputSizeMb: totalSizeMb * OUTPUT_SIZE_RATIO,
    };
  }
}

async function deleteSources(paths: string[], outputFile: string): Promise<string[]> {
  const deleted: string[] = [];
  for (const path of paths) {
    if (resolve(path) === outputFile) continue;
    try {
      await rm(path);
      deleted.push(path);
      log.debug({ path }, 'Deleted merged source');
    } catch (error) {
      log.warn({ path, err: errorMessage(error) }, 'Failed to delete merged source');
    }
  }
  log.info({ count: deleted.length }, 'Deleted original PDF files');
  return deleted;
}

/**
 * PDF files under `dir` that pass the filter, sorted by path. Resolves
 * undefined when `dir` is not a directory.
 */
export async function findMergeCandidates(
  dir: string,
  options: Pick<MergeDirectoryOptions, 'filterMode' | 'keywords'> = {},
): Promise<string[] | undefined> {
  try {
    if (!(await stat(dir)).isDirectory()) return undefined;
  } catch {
    return undefined;
  }

  const mode = options.filterMode ?? 'all';
  const files = await collectFiles(dir, '.pdf');
  return files
    .filter((path) => matchesFilter([basename(path)], mode, options.keywords))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Merge files into `outputDir` (default: current directory).
 */
export function mergePdfs(
  filePaths: string[],
  options: MergeOptions & { outputDir?: string } = {},
): Promise<MergeResult> {
  return new PdfMerger(options.outputDir ?? '.').mergePdfs(filePaths, options);
}

/**
 * Merge a directory's PDFs, writing the output into `outputDir`
 * (default: the directory itself).
 */
export function mergeDirectory(
  dir: string,
  options: MergeDirectoryOptions & { outputDir?: string } = {},
): Promise<MergeResult> {
  return new PdfMerger(options.outputDir ?? dir).mergeDirectory(dir, options);
}

export function getMergeInfo(filePaths: string[]): Promise<MergeInfo> {
  return new PdfMerger('.').getMergeInfo(filePaths);
}
