import { existsSync } from 'node:fs';
import { Command } from 'commander';

import { applyConfigTemplate, generateDynamicConfig, isTemplateName } from '../config/dynamic.js';
import { defaultConfig, DEFAULT_CONFIG_FILE, loadConfig, saveConfig } from '../config/loader.js';
import { saveReport } from '../crawler/report.js';
import { setLogLevel, type LogLevel } from '../logger.js';
import {
  DEFAULT_MERGE_NAME,
  findMergeCandidates,
  getMergeInfo,
  mergeDirectory,
} from '../merger/index.js';
import { crawl } from '../sdk/index.js';
import type { PdfHarvestConfig } from '../types.js';
import { isValidHttpUrl } from '../url/index.js';
import {
  buildConfig,
  collect,
  collectKeywords,
  parseBrowserType,
  parseFilterMode,
  parseLanguage,
  type CrawlCLIOptions,
  type MergeCLIOptions,
} from './options.js';
import {
  createProgressCallbacks,
  printDryRun,
  printMergeInfo,
  printMergeResult,
  printSummary,
  type Verbosity,
} from './progress.js';

/**
 * Determine the verbosity level from CLI flags.
 */
function getVerbosity(options: { verbose?: boolean; quiet?: boolean }): Verbosity {
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

/**
 * Apply the log level implied by the flags, or the configured one.
 */
function applyLogLevel(verbosity: Verbosity, configured: LogLevel): void {
  if (verbosity === 'verbose') setLogLevel('debug');
  else if (verbosity === 'quiet') setLogLevel('error');
  else setLogLevel(configured);
}

function validateVerbosityFlags(options: { verbose?: boolean; quiet?: boolean }): void {
  if (options.verbose && options.quiet) {
    throw new Error('Cannot use --verbose and --quiet at the same time.');
  }
}

/**
 * Validate crawl arguments before doing any work.
 *
 * @throws Error if validation fails
 */
function validateCrawlOptions(url: string, options: CrawlCLIOptions): void {
  if (!isValidHttpUrl(url)) {
    throw new Error(`Invalid URL "${url}". Expected an absolute http:// or https:// URL.`);
  }
  validateVerbosityFlags(options);
  const mode = parseFilterMode(options.filter);
  if (mode === 'keyword' && options.keyword.length === 0) {
    throw new Error('The --keyword option is required when using the "keyword" filter.');
  }
}

function fail(error: unknown): void {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
}

async function crawlAction(url: string, options: CrawlCLIOptions): Promise<void> {
  try {
    validateCrawlOptions(url, options);

    const verbosity = getVerbosity(options);
    const config = buildConfig(url, options);
    applyLogLevel(verbosity, config.logging.level);

    const filterMode = parseFilterMode(options.filter);
    const merge = options.merge
      ? { outputName: options.mergeName ?? DEFAULT_MERGE_NAME, deleteOriginals: !options.keepOriginals }
      : undefined;

    if (options.dryRun) {
      printDryRun(url, config, { filterMode, keywords: options.keyword, merge: merge !== undefined });
      process.exit(0);
      return;
    }

    const callbacks = createProgressCallbacks(verbosity);
    const result = await crawl({
      url,
      config,
      filterMode,
      keywords: options.keyword,
      merge,
      onCandidatesFound: callbacks.onCandidatesFound,
      onDownloadComplete: callbacks.onDownloadComplete,
    });

    printSummary(result, verbosity);

    if (options.report) {
      const reportPath = await saveReport(
        result,
        typeof options.report === 'string' ? options.report : undefined,
      );
      if (verbosity !== 'quiet') process.stderr.write(`Report: ${reportPath}\n`);
    }

    process.exit(result.success ? 0 : 1);
  } catch (error) {
    fail(error);
  }
}

async function mergeAction(dir: string, options: MergeCLIOptions): Promise<void> {
  try {
    validateVerbosityFlags(options);
    const verbosity = getVerbosity(options);
    applyLogLevel(verbosity, 'info');

    const filterMode = parseFilterMode(options.filter);
    if (filterMode === 'keyword' && options.keyword.length === 0) {
      throw new Error('The --keyword option is required when using the "keyword" filter.');
    }

    if (options.info) {
      const files = await findMergeCandidates(dir, { filterMode, keywords: options.keyword });
      if (files === undefined) {
        throw new Error(`Directory does not exist: ${dir}`);
      }
      printMergeInfo(files, await getMergeInfo(files));
      process.exit(0);
      return;
    }

    const result = await mergeDirectory(dir, {
      outputName: options.name,
      outputDir: options.output,
      filterMode,
      keywords: options.keyword,
      deleteOriginals: !options.keepOriginals,
    });
    printMergeResult(result, verbosity);
    process.exit(result.success ? 0 : 1);
  } catch (error) {
    fail(error);
  }
}

/**
 * Configuration that `config template` and `config generate` start from.
 * A target file that does not exist yet is created on --write.
 */
function loadBaseConfig(path: string | undefined): PdfHarvestConfig {
  return path !== undefined && !existsSync(path) ? defaultConfig() : loadConfig(path);
}

function writeOrPrint(config: PdfHarvestConfig, write: boolean, path: string): void {
  if (write) {
    saveConfig(config, path, { backup: true });
    process.stderr.write(`Config written to ${path}\n`);
  } else {
    process.stdout.write(JSON.stringify(config, null, 2) + '\n');
  }
}

/**
 * Create and configure the commander program with all commands.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('pdf-harvest')
    .description('Find PDF links on a web page, download them and merge them')
    .version('0.1.0');

  program
    .command('crawl')
    .description('Crawl one page for PDF links and download them')
    .argument('<url>', 'Page to crawl')

    // Selection
    .option('--filter <mode>', 'Link filter: all, prefix, or keyword', 'all')
    .option('--keyword <kw>', 'Keyword for the keyword filter (repeatable, comma-separated)', collectKeywords, [])

    // Output
    .option('-o, --output <dir>', 'Download directory')
    .option('--subfolder', 'Put downloads in a folder named after the site')
    .option('--overwrite', 'Download again even when the file exists')
    .option('--workers <n>', 'Parallel downloads (1-10)')

    // Browser
    .option('--headed', 'Show the browser window')
    .option('--engine <engine>', 'Page engine: chromium or static')

    // Network
    .option('--config <path>', 'Path to config JSON file')
    .option('--header <key:value>', 'Custom header (repeatable)', collect, [])
    .option('--user-agent <ua>', 'User-Agent string')
    .option('--random-user-agent', 'Generate a User-Agent and browser-like headers')
    .option('--insecure', 'Skip TLS certificate verification')

    // Merge
    .option('--merge', 'Merge downloaded PDFs into one file')
    .option('--merge-name <name>', 'Merged file name without extension', DEFAULT_MERGE_NAME)
    .option('--keep-originals', 'Keep the downloaded files after merging')

    // General
    .option('--report [path]', 'Write a text report (default crawl_report_<timestamp>.txt)')
    .option('-v, --verbose', 'Verbose logging')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('--dry-run', 'Show what would be done without downloading')
    .action(crawlAction);

  program
    .command('merge')
    .description('Merge the PDF files in a directory')
    .argument('<dir>', 'Directory to search recursively')
    .option('--name <name>', 'Output file name without extension', DEFAULT_MERGE_NAME)
    .option('--output <dir>', 'Directory for the merged file (default: <dir>)')
    .option('--filter <mode>', 'File filter: all, prefix, or keyword', 'all')
    .option('--keyword <kw>', 'Keyword for the keyword filter (repeatable, comma-separated)', collectKeywords, [])
    .option('--keep-originals', 'Keep the source files after merging')
    .option('--info', 'Only show what would be merged')
    .option('-v, --verbose', 'Verbose logging')
    .option('-q, --quiet', 'Suppress output except errors')
    .action(mergeAction);

  const configCommand = program.command('config').description('Inspect and generate configuration');

  configCommand
    .command('show')
    .description('Print the effective configuration')
    .option('--config <path>', 'Path to config JSON file')
    .action((options: { config?: string }) => {
      try {
        process.stdout.write(JSON.stringify(loadConfig(options.config), null, 2) + '\n');
        process.exit(0);
      } catch (error) {
        fail(error);
      }
    });

  configCommand
    .command('template')
    .description('Apply a template: minimal, aggressive, or stealth')
    .argument('<name>', 'Template name')
    .option('--config <path>', 'Config file to start from and write to (default: config.json)')
    .option('--write', 'Write the result to the config file')
    .action((name: string, options: { config?: string; write?: boolean }) => {
      try {
        if (!isTemplateName(name)) {
          throw new Error(`Unknown template "${name}". Must be one of: minimal, aggressive, stealth`);
        }
        const config = applyConfigTemplate(loadBaseConfig(options.config), name);
        writeOrPrint(config, options.write ?? false, options.config ?? DEFAULT_CONFIG_FILE);
        process.exit(0);
      } catch (error) {
        fail(error);
      }
    });

  configCommand
    .command('generate')
    .description('Generate a User-Agent and headers, optionally tuned for a site')
    .argument('[url]', 'Target site')
    .option('--language <lang>', 'Accept-Language profile: zh-TW, zh-CN, en-US, ja-JP')
    .option('--browser <type>', 'Browser family: chrome, firefox, safari, edge')
    .option('--config <path>', 'Config file to start from and write to (default: config.json)')
    .option('--write', 'Write the result to the config file')
    .action(
      (
        url: string | undefined,
        options: { language?: string; browser?: string; config?: string; write?: boolean },
      ) => {
        try {
          const config = generateDynamicConfig(loadBaseConfig(options.config), {
            targetUrl: url,
            language: options.language !== undefined ? parseLanguage(options.language) : undefined,
            browserType: options.browser !== undefined ? parseBrowserType(options.browser) : undefined,
          });
          writeOrPrint(config, options.write ?? false, options.config ?? DEFAULT_CONFIG_FILE);
          process.exit(0);
        } catch (error) {
          fail(error);
        }
      },
    );

  return program;
}

/**
 * Main CLI entry point.
 *
 * @param argv - The process.argv array to parse
 */
export async function run(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
