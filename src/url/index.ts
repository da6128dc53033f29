import { moduleLogger } from '../logger.js';

const log = moduleLogger('url');

/** Maximum accepted URL length. */
export const MAX_URL_LENGTH = 2048;

/** Maximum filename length produced by the sanitizer. */
export const MAX_FILENAME_LENGTH = 200;

const PDF_QUERY_PARAMS = ['type', 'format', 'file'];
const FILENAME_QUERY_PARAMS = ['file', 'filename', 'name'];

// A scheme followed by a port number ("localhost:8080") is a host, not a scheme.
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:(?!\d)/i;

function hasScheme(url: string): boolean {
  return SCHEME_PATTERN.test(url);
}

function tryParse(url: string): URL | undefined {
  try {
    return new URL(url);
  } catch {
    return undefined;
  }
}

/**
 * Normalize a URL.
 *
 * Relative input is resolved against `baseUrl`; input without a scheme gets
 * `http`. Scheme and host are lower-cased, runs of `/` in the path collapse
 * to one and an empty path becomes `/`. Never throws: input that cannot be
 * parsed is returned unchanged.
 *
 * @param url - Raw URL, possibly relative or scheme-less
 * @param baseUrl - Base used to resolve relative URLs
 */
export function normalizeUrl(url: string, baseUrl?: string): string {
  const trimmed = url.trim();
  if (!trimmed) return '';

  try {
    let parsed: URL;
    if (hasScheme(trimmed)) {
      parsed = new URL(trimmed);
    } else if (baseUrl) {
      parsed = new URL(trimmed, baseUrl);
    } else {
      parsed = new URL(trimmed.startsWith('//') ? `http:${trimmed}` : `http://${trimmed}`);
    }

    if (parsed.protocol === 'http:' || parsed.protocol === 'https:') {
      if (!parsed.hostname) return url;
      parsed.pathname = parsed.pathname.replace(/\/{2,}/g, '/') || '/';
    }

    const normalized = parsed.href;
    log.debug({ url, normalized }, 'Normalized URL');
    return normalized;
  } catch (error) {
    log.debug({ url, err: error }, 'URL normalization failed');
    return url;
  }
}

/**
 * Whether a URL looks like it points at a PDF document.
 *
 * True when the path ends in `.pdf`, a `type`/`format`/`file` query
 * parameter equals `pdf`, or the URL contains a `/pdf/` or `/document/`
 * segment.
 */
export function isPdfUrl(url: string): boolean {
  const lower = url.toLowerCase();
  const parsed = tryParse(url);

  if (parsed) {
    if (parsed.pathname.toLowerCase().endsWith('.pdf')) return true;
    for (const param of PDF_QUERY_PARAMS) {
      if (parsed.searchParams.get(param)?.toLowerCase() === 'pdf') return true;
    }
  } else if (lower.split(/[?#]/, 1)[0].endsWith('.pdf')) {
    return true;
  }

  return lower.includes('/pdf/') || lower.includes('/document/');
}

/**
 * Make a string safe to use as a filename.
 *
 * Reserved characters become `_`, runs of whitespace and `_` collapse to a
 * single `_`, leading and trailing `_` are trimmed, runs of `.` collapse
 * and the result is cut to 200 code points.
 */
export function sanitizeFilename(name: string): string {
  let cleaned = name
    .replace(/[<>:"|?*\\/]/g, '_')
    .replace(/\0/g, '')
    .replace(/[\s_]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .replace(/\.{2,}/g, '.');

  const codePoints = Array.from(cleaned);
  if (codePoints.length > MAX_FILENAME_LENGTH) {
    cleaned = codePoints.slice(0, MAX_FILENAME_LENGTH).join('').replace(/_+$/, '');
  }

  return cleaned;
}

/**
 * Sanitized `raw`, or undefined when nothing usable is left. A name made
 * only of dots would resolve to the directory itself.
 */
function usableFilename(raw: string): string | undefined {
  const name = sanitizeFilename(raw);
  return /^\.*$/.test(name) ? undefined : name;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Derive a local filename for a PDF link.
 *
 * Preference: the last path segment when it has an extension, then a
 * `file`/`filename`/`name` query parameter, then the link text with a
 * `.pdf` suffix, then `document_<unix seconds>.pdf`.
 *
 * @param url - Absolute URL of the document
 * @param fallbackText - Link text used when the URL carries no name
 * @param now - Clock used for the generated name
 */
export function extractFilename(
  url: string,
  fallbackText = '',
  now: () => number = Date.now,
): string {
  const parsed = tryParse(url);

  if (parsed) {
    const segment = parsed.pathname.split('/').pop() ?? '';
    if (segment.includes('.')) {
      const name = usableFilename(safeDecode(segment));
      if (name) return name;
    }

    for (const key of FILENAME_QUERY_PARAMS) {
      const value = parsed.searchParams.get(key);
      if (value && value.includes('.')) {
        const name = usableFilename(value);
        if (name) return name;
      }
    }
  }

  const text = usableFilename(fallbackText);
  if (text) {
    if (text.toLowerCase().endsWith('.pdf')) return text;
    const stem = Array.from(text).slice(0, MAX_FILENAME_LENGTH - 4).join('');
    return sanitizeFilename(`${stem}.pdf`);
  }

  return `document_${Math.floor(now() / 1000)}.pdf`;
}

/**
 * Whether `url` is an absolute http(s) URL with a host, no longer than
 * 2048 characters.
 */
export function isValidHttpUrl(url: string): boolean {
  if (!url || url.length > MAX_URL_LENGTH) return false;
  const parsed = tryParse(url);
  if (!parsed) return false;
  return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname !== '';
}

/**
 * Whether `url` is a valid http(s) URL that looks like a PDF.
 */
export function validatePdfUrl(url: string): boolean {
  return isValidHttpUrl(url) && isPdfUrl(url);
}

/**
 * Filesystem-safe folder name for a URL's host, used for per-site
 * download folders. Falls back to `unknown_host`.
 */
export function hostFolderName(url: string): string {
  const host = tryParse(url)?.host ?? '';
  return sanitizeFilename(host) || 'unknown_host';
}

export { checkUrlAccessible } from './check.js';
export type { UrlAccessibility, CheckUrlOptions } from './check.js';
