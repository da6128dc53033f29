import { existsSync } from 'node:fs';
import { mkdir, readdir, rm, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { errorMessage } from '../errors.js';
import { moduleLogger } from '../logger.js';
import type { PdfHarvestConfig } from '../types.js';
import { hostFolderName } from '../url/index.js';

const log = moduleLogger('output');

/**
 * Directory that receives downloads for a crawl of `targetUrl`:
 * `output.baseDir`, plus one folder per host when `createSubfolder` is set.
 */
export function resolveDownloadDir(config: PdfHarvestConfig, targetUrl: string): string {
  const base = resolve(config.output.baseDir);
  return config.output.createSubfolder ? join(base, hostFolderName(targetUrl)) : base;
}

/**
 * Create a directory and its parents if missing.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

export function fileExists(path: string): boolean {
  return existsSync(path);
}

/**
 * Size of a file in bytes, or 0 when it cannot be read.
 */
export async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch {
    return 0;
  }
}

/**
 * Delete a file, logging instead of throwing on failure.
 *
 * @returns Whether the file is gone afterwards
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await rm(path, { force: true });
    return true;
  } catch (error) {
    log.warn({ path, err: errorMessage(error) }, 'Failed to remove file');
    return false;
  }
}

/**
 * Recursively list files under `dir` whose name ends with `extension`
 * (case-insensitive).
 */
export async function collectFiles(dir: string, extension: string): Promise<string[]> {
  const suffix = extension.toLowerCase();
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectFiles(fullPath, extension)));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(suffix)) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Local timestamp formatted as `YYYYMMDD_HHMMSS`.
 */
export function fileTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
