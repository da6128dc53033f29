import { copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import type { ZodError } from 'zod';

import { ConfigError, errorMessage } from '../errors.js';
import { moduleLogger } from '../logger.js';
import { fileTimestamp } from '../output/index.js';
import type { PdfHarvestConfigInput } from '../types.js';
import { pdfHarvestConfigSchema, type PdfHarvestConfig } from './schema.js';

const log = moduleLogger('config');

/** Config file looked up in the working directory when no path is given. */
export const DEFAULT_CONFIG_FILE = 'config.json';

/** Directory, beside the config file, that receives backups. */
export const BACKUP_DIR_NAME = 'config_backups';

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an in-memory configuration object, filling defaults.
 *
 * @throws ConfigError listing every schema violation
 */
export function parseConfig(value: unknown, source?: string): PdfHarvestConfig {
  const parsed = pdfHarvestConfigSchema.safeParse(value ?? {});
  if (!parsed.success) {
    const where = source ? ` in "${source}"` : '';
    throw new ConfigError(`Invalid configuration${where}: ${formatIssues(parsed.error)}`, source);
  }
  return parsed.data;
}

/**
 * The configuration used when nothing is specified.
 */
export function defaultConfig(): PdfHarvestConfig {
  return parseConfig({});
}

/**
 * Load configuration from a JSON file.
 *
 * An explicit path must exist and parse. Without a path, `./config.json`
 * is used when present and the defaults otherwise.
 */
export function loadConfig(filePath?: string): PdfHarvestConfig {
  const target = filePath ?? DEFAULT_CONFIG_FILE;

  if (!filePath && !existsSync(target)) {
    log.debug({ path: target }, 'No config file found, using defaults');
    return defaultConfig();
  }

  let content: string;
  try {
    content = readFileSync(target, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file "${target}": ${errorMessage(error)}`,
      target,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in config file "${target}": ${errorMessage(error)}`,
      target,
    );
  }

  const config = parseConfig(json, target);
  log.debug({ path: target }, 'Loaded config file');
  return config;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

/**
 * Deep-merge a partial configuration over a full one and re-validate.
 * Plain objects merge key by key; any other value replaces the base value.
 */
export function mergeConfig(
  base: PdfHarvestConfig,
  overrides: PdfHarvestConfigInput,
): PdfHarvestConfig {
  return parseConfig(deepMerge(base, overrides));
}

export interface SaveConfigOptions {
  /** Copy an existing file to config_backups/ before overwriting it. */
  backup?: boolean;
  now?: Date;
}

/**
 * Write a configuration as pretty-printed JSON.
 *
 * @returns The backup path when a backup was made
 */
export function saveConfig(
  config: PdfHarvestConfig,
  filePath: string = DEFAULT_CONFIG_FILE,
  options: SaveConfigOptions = {},
): string | undefined {
  const target = resolve(filePath);
  let backupPath: string | undefined;

  if (options.backup && existsSync(target)) {
    const backupDir = join(dirname(target), BACKUP_DIR_NAME);
    mkdirSync(backupDir, { recursive: true });
    backupPath = join(backupDir, `config_backup_${fileTimestamp(options.now)}.json`);
    copyFileSync(target, backupPath);
    log.info({ backupPath }, 'Config backup created');
  }

  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  log.info({ path: target }, 'Config saved');
  return backupPath;
}
