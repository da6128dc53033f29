import { moduleLogger } from '../logger.js';
import type { PdfHarvestConfigInput } from '../types.js';
import { mergeConfig } from './loader.js';
import type { PdfHarvestConfig } from './schema.js';

const log = moduleLogger('config');

export const BROWSER_TYPES = ['chrome', 'firefox', 'safari', 'edge'] as const;
export type BrowserType = (typeof BROWSER_TYPES)[number];

export const LANGUAGES = ['zh-TW', 'zh-CN', 'en-US', 'ja-JP'] as const;
export type Language = (typeof LANGUAGES)[number];

/** Source of uniform numbers in [0, 1). */
export type RandomSource = () => number;

const USER_AGENT_TEMPLATES: Record<BrowserType, readonly string[]> = {
  chrome: [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/{version}.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/{version}.0.0.0 Safari/537.36',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/{version}.0.0.0 Safari/537.36',
  ],
  firefox: [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:{version}) Gecko/20100101 Firefox/{version}',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:{version}) Gecko/20100101 Firefox/{version}',
    'Mozilla/5.0 (X11; Linux x86_64; rv:{version}) Gecko/20100101 Firefox/{version}',
  ],
  safari: [
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/{version} Safari/605.1.15',
  ],
  edge: [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/{version}.0.0.0 Safari/537.36 Edg/{version}.0.0.0',
  ],
};

/** Inclusive version ranges. */
const BROWSER_VERSIONS: Record<BrowserType, readonly [number, number]> = {
  chrome: [100, 120],
  firefox: [100, 120],
  safari: [15, 17],
  edge: [100, 120],
};

const DOCUMENT_ACCEPT =
  'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,image/apng,*/*;q=0.8';

const LANGUAGE_HEADERS: Record<Language, Record<string, string>> = {
  'zh-TW': { 'Accept-Language': 'zh-TW,zh;q=0.9,en;q=0.8' },
  'zh-CN': { 'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8' },
  'en-US': { 'Accept-Language': 'en-US,en;q=0.9' },
  'ja-JP': { 'Accept-Language': 'ja-JP,ja;q=0.9,en;q=0.8' },
};

interface SiteProfile {
  browser: BrowserType;
  language: Language;
  headers: Record<string, string>;
}

const SITE_PROFILES: Record<string, SiteProfile> = {
  'law.moj.gov.tw': {
    browser: 'chrome',
    language: 'zh-TW',
    headers: { Referer: 'https://law.moj.gov.tw/', 'Cache-Control': 'no-cache' },
  },
  'www.cec.gov.tw': {
    browser: 'chrome',
    language: 'zh-TW',
    headers: { Referer: 'https://www.cec.gov.tw/', 'Cache-Control': 'no-cache' },
  },
};

function pick<T>(items: readonly T[], random: RandomSource): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

function isBrowserType(value: string): value is BrowserType {
  return BROWSER_TYPES.some((type) => type === value);
}

function findSiteProfile(targetUrl: string | undefined): SiteProfile | undefined {
  if (!targetUrl) return undefined;
  for (const [domain, profile] of Object.entries(SITE_PROFILES)) {
    if (targetUrl.includes(domain)) return profile;
  }
  return undefined;
}

/**
 * Build a plausible desktop User-Agent string.
 *
 * @param browserType - Browser family; random when omitted, chrome when unknown
 * @param random - Source of randomness, injectable for tests
 */
export function generateRandomUserAgent(
  browserType?: string,
  random: RandomSource = Math.random,
): string {
  const type: BrowserType =
    browserType === undefined
      ? pick(BROWSER_TYPES, random)
      : isBrowserType(browserType)
        ? browserType
        : 'chrome';

  const template = pick(USER_AGENT_TEMPLATES[type], random);
  const [min, max] = BROWSER_VERSIONS[type];
  const version = min + Math.min(max - min, Math.floor(random() * (max - min + 1)));
  return template.replaceAll('{version}', String(version));
}

/**
 * Build browser-like request headers for a target site.
 *
 * Known hosts contribute their own Referer and cache headers and pick the
 * language and browser family when the caller does not.
 */
export function generateSmartHeaders(
  targetUrl?: string,
  language?: Language,
  random: RandomSource = Math.random,
): Record<string, string> {
  const site = findSiteProfile(targetUrl);
  const lang: Language = language ?? site?.language ?? 'zh-TW';

  return {
    Connection: 'keep-alive',
    'Upgrade-Insecure-Requests': '1',
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Site': 'none',
    'Sec-Fetch-User': '?1',
    Accept: DOCUMENT_ACCEPT,
    'Accept-Encoding': 'gzip, deflate, br',
    ...LANGUAGE_HEADERS[lang],
    ...(site?.headers ?? {}),
    'User-Agent': generateRandomUserAgent(site?.browser, random),
  };
}

export interface DynamicConfigOptions {
  targetUrl?: string;
  language?: Language;
  browserType?: BrowserType;
  random?: RandomSource;
}

/**
 * Return a copy of `base` with a generated User-Agent and header set.
 * The header set replaces the configured one; TLS verification is left
 * as configured.
 */
export function generateDynamicConfig(
  base: PdfHarvestConfig,
  options: DynamicConfigOptions = {},
): PdfHarvestConfig {
  const random = options.random ?? Math.random;
  const userAgent = generateRandomUserAgent(options.browserType, random);
  const headers = generateSmartHeaders(options.targetUrl, options.language, random);
  // The User-Agent travels in network.userAgent only.
  delete headers['User-Agent'];

  log.debug({ targetUrl: options.targetUrl, userAgent }, 'Generated dynamic network config');

  return {
    ...base,
    network: { ...base.network, userAgent, headers },
  };
}

export const CONFIG_TEMPLATES = {
  minimal: {
    download: { maxWorkers: 4, timeout: 30 },
    output: { baseDir: './downloads', createSubfolder: false },
    network: { verifySsl: false },
    browser: { headless: true },
  },
  aggressive: {
    download: { maxWorkers: 16, timeout: 60 },
    output: { baseDir: './downloads', createSubfolder: false },
    network: { verifySsl: false },
    browser: { headless: true, slowMo: 0 },
  },
  stealth: {
    download: { maxWorkers: 2, timeout: 45 },
    output: { baseDir: './downloads', createSubfolder: false },
    network: { verifySsl: true },
    browser: { headless: false, slowMo: 2000 },
  },
} satisfies Record<string, PdfHarvestConfigInput>;

export type TemplateName = keyof typeof CONFIG_TEMPLATES;

export function isTemplateName(value: string): value is TemplateName {
  return Object.hasOwn(CONFIG_TEMPLATES, value);
}

/**
 * Overlay a named template on `base`. Unknown names fall back to `minimal`.
 */
export function applyConfigTemplate(base: PdfHarvestConfig, name: string): PdfHarvestConfig {
  const templateName: TemplateName = isTemplateName(name) ? name : 'minimal';
  if (templateName !== name) {
    log.warn({ name }, 'Unknown config template, using minimal');
  }
  return mergeConfig(base, CONFIG_TEMPLATES[templateName]);
}
