import { generateDynamicConfig, type BrowserType, type Language, BROWSER_TYPES, LANGUAGES } from '../config/dynamic.js';
import { loadConfig, mergeConfig } from '../config/loader.js';
import type { FilterMode, PdfHarvestConfig, PdfHarvestConfigInput } from '../types.js';
import { FILTER_MODES } from '../types.js';

/** Bounds for --workers. */
export const MIN_WORKERS = 1;
export const MAX_WORKERS = 10;

const ENGINES = ['chromium', 'static'] as const;

/**
 * Raw options of the `crawl` command as parsed by commander.
 */
export interface CrawlCLIOptions {
  filter: string;
  keyword: string[];
  output?: string;
  subfolder?: boolean;
  overwrite?: boolean;
  workers?: string;
  headed?: boolean;
  engine?: string;
  config?: string;
  header: string[];
  userAgent?: string;
  randomUserAgent?: boolean;
  insecure?: boolean;
  merge?: boolean;
  mergeName?: string;
  keepOriginals?: boolean;
  report?: string | boolean;
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
}

/**
 * Raw options of the `merge` command.
 */
export interface MergeCLIOptions {
  name: string;
  filter: string;
  keyword: string[];
  output?: string;
  keepOriginals?: boolean;
  info?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Accumulate repeated option values into an array.
 * Used for --header, which can be specified multiple times.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Accumulate --keyword values; each value may hold several
 * comma-separated keywords.
 */
export function collectKeywords(value: string, previous: string[]): string[] {
  const added = value
    .split(',')
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword !== '');
  return [...previous, ...added];
}

/**
 * Parse --header values from "key:value" format into a Record.
 * Splits on the first colon to allow colons in the value.
 *
 * @throws Error if a header value does not contain a colon
 */
export function parseHeaders(headers: string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const header of headers) {
    const colonIndex = header.indexOf(':');
    if (colonIndex === -1) {
      throw new Error(`Invalid header format: "${header}". Expected "key:value" format.`);
    }
    const key = header.slice(0, colonIndex).trim();
    const value = header.slice(colonIndex + 1).trim();
    if (!key) {
      throw new Error(`Invalid header format: "${header}". Header name cannot be empty.`);
    }
    result[key] = value;
  }

  return result;
}

/**
 * Validate a --filter value.
 */
export function parseFilterMode(value: string): FilterMode {
  const mode = FILTER_MODES.find((m) => m === value);
  if (!mode) {
    throw new Error(`Invalid filter "${value}". Must be one of: ${FILTER_MODES.join(', ')}`);
  }
  return mode;
}

/**
 * Parse --workers, clamping to 1..10.
 */
export function parseWorkers(value: string): number {
  const workers = parseInt(value, 10);
  if (Number.isNaN(workers)) {
    throw new Error(`Invalid worker count "${value}". Must be a number.`);
  }
  return Math.min(MAX_WORKERS, Math.max(MIN_WORKERS, workers));
}

export function parseLanguage(value: string): Language {
  const language = LANGUAGES.find((l) => l === value);
  if (!language) {
    throw new Error(`Invalid language "${value}". Must be one of: ${LANGUAGES.join(', ')}`);
  }
  return language;
}

export function parseBrowserType(value: string): BrowserType {
  const browser = BROWSER_TYPES.find((b) => b === value);
  if (!browser) {
    throw new Error(`Invalid browser "${value}". Must be one of: ${BROWSER_TYPES.join(', ')}`);
  }
  return browser;
}

/**
 * Map crawl flags to configuration overrides. Only flags the user
 * actually gave produce overrides.
 */
export function buildConfigOverrides(options: CrawlCLIOptions): PdfHarvestConfigInput {
  const overrides: PdfHarvestConfigInput = {};

  const download: NonNullable<PdfHarvestConfigInput['download']> = {};
  if (options.workers !== undefined) {
    download.maxWorkers = parseWorkers(options.workers);
  }

  const output: NonNullable<PdfHarvestConfigInput['output']> = {};
  if (options.output !== undefined) output.baseDir = options.output;
  if (options.subfolder) output.createSubfolder = true;
  if (options.overwrite) output.overwriteExisting = true;

  const network: NonNullable<PdfHarvestConfigInput['network']> = {};
  if (options.userAgent !== undefined) network.userAgent = options.userAgent;
  if (options.insecure) network.verifySsl = false;

  const browser: NonNullable<PdfHarvestConfigInput['browser']> = {};
  if (options.headed) browser.headless = false;
  if (options.engine !== undefined) {
    const engine = ENGINES.find((e) => e === options.engine);
    if (!engine) {
      throw new Error(`Invalid engine "${options.engine}". Must be one of: ${ENGINES.join(', ')}`);
    }
    browser.engine = engine;
  }

  if (Object.keys(download).length > 0) overrides.download = download;
  if (Object.keys(output).length > 0) overrides.output = output;
  if (Object.keys(network).length > 0) overrides.network = network;
  if (Object.keys(browser).length > 0) overrides.browser = browser;

  return overrides;
}

/**
 * Build the effective configuration for `crawl`: the config file, the
 * flag overrides, an optional generated User-Agent and header set, then
 * any --header values on top.
 */
export function buildConfig(url: string, options: CrawlCLIOptions): PdfHarvestConfig {
  let config = mergeConfig(loadConfig(options.config), buildConfigOverrides(options));

  if (options.randomUserAgent) {
    config = generateDynamicConfig(config, { targetUrl: url });
    if (options.userAgent !== undefined) {
      config = mergeConfig(config, { network: { userAgent: options.userAgent } });
    }
  }

  const headers = parseHeaders(options.header);
  if (Object.keys(headers).length > 0) {
    config = mergeConfig(config, { network: { headers } });
  }

  return config;
}
