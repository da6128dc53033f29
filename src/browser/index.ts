import type { PdfHarvestConfig } from '../types.js';

/**
 * Narrow view of a DOM element, implemented by every page engine.
 */
export interface DomElement {
  getAttribute(name: string): Promise<string | null>;
  textContent(): Promise<string | null>;
  /** First matching descendant, or null. */
  querySelector(selector: string): Promise<DomElement | null>;
}

/**
 * One page in one browser session, scoped to a single crawl.
 *
 * Operations run sequentially; callers never issue two DOM operations
 * against the same session concurrently.
 */
export interface PageSession {
  /** URL that relative links resolve against; empty before navigation. */
  baseUrl(): string;
  /**
   * Load `url`. Resolves false when the response is missing or not OK,
   * or the load fails; never rejects for those cases.
   */
  navigateTo(url: string): Promise<boolean>;
  /**
   * Wait for DOM-ready, then best-effort for network idle, then the
   * configured settle grace period.
   */
  awaitSettled(timeoutMs?: number): Promise<void>;
  querySelectorAll(selector: string): Promise<DomElement[]>;
  /** Current page HTML. */
  content(): Promise<string>;
  /** Release every resource; never rejects. */
  close(): Promise<void>;
}

/**
 * Options shared by every engine, taken from configuration.
 */
export interface PageSessionOptions {
  headless: boolean;
  slowMo: number;
  userAgent: string;
  headers: Record<string, string>;
  verifySsl: boolean;
  /** Default timeout for page operations in milliseconds. */
  timeoutMs: number;
  networkIdleTimeoutMs: number;
  settleDelayMs: number;
}

/** Opens a ready-to-navigate session. */
export type PageSessionFactory = (options: PageSessionOptions) => Promise<PageSession>;

/**
 * Extract page-session options from configuration.
 */
export function sessionOptionsFromConfig(config: PdfHarvestConfig): PageSessionOptions {
  return {
    headless: config.browser.headless,
    slowMo: config.browser.slowMo,
    userAgent: config.network.userAgent,
    headers: config.network.headers,
    verifySsl: config.network.verifySsl,
    timeoutMs: config.browser.timeoutMs,
    networkIdleTimeoutMs: config.browser.networkIdleTimeoutMs,
    settleDelayMs: config.browser.settleDelayMs,
  };
}

/**
 * Pick the session factory for the configured engine.
 */
export async function resolveSessionFactory(
  engine: PdfHarvestConfig['browser']['engine'],
): Promise<PageSessionFactory> {
  if (engine === 'static') {
    const { openStaticSession } = await import('./static.js');
    return (options) => openStaticSession(options);
  }
  const { openPlaywrightSession } = await import('./playwright.js');
  return openPlaywrightSession;
}

/**
 * Open a page session with the engine named in configuration.
 */
export async function openPageSession(config: PdfHarvestConfig): Promise<PageSession> {
  const factory = await resolveSessionFactory(config.browser.engine);
  return factory(sessionOptionsFromConfig(config));
}
