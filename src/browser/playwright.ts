import {
  chromium,
  type Browser,
  type BrowserContext,
  type ElementHandle,
  type Page,
} from 'playwright-core';
import { setTimeout as sleep } from 'node:timers/promises';

import { errorMessage, SessionError } from '../errors.js';
import { moduleLogger } from '../logger.js';
import type { DomElement, PageSession, PageSessionOptions } from './index.js';

const log = moduleLogger('browser');

type Handle = ElementHandle<SVGElement | HTMLElement>;

function wrapHandle(handle: Handle): DomElement {
  return {
    getAttribute: (name) => handle.getAttribute(name),
    textContent: () => handle.textContent(),
    querySelector: async (selector) => {
      const child = await handle.$(selector);
      return child ? wrapHandle(child) : null;
    },
  };
}

async function release(what: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (error) {
    log.warn({ resource: what, err: errorMessage(error) }, 'Failed to release browser resource');
  }
}

class PlaywrightSession implements PageSession {
  private closed = false;

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly options: PageSessionOptions,
  ) {}

  baseUrl(): string {
    const url = this.page.url();
    return url === 'about:blank' ? '' : url;
  }

  async navigateTo(url: string): Promise<boolean> {
    const page = this.requireOpen();
    try {
      log.info({ url }, 'Navigating');
      const response = await page.goto(url, { waitUntil: 'networkidle' });
      if (!response) {
        log.warn({ url }, 'Navigation returned no response');
        return false;
      }
      if (!response.ok()) {
        log.warn({ url, status: response.status() }, 'Navigation returned non-OK status');
        return false;
      }
      return true;
    } catch (error) {
      log.warn({ url, err: errorMessage(error) }, 'Navigation failed');
      return false;
    }
  }

  async awaitSettled(timeoutMs: number = this.options.timeoutMs): Promise<void> {
    const page = this.requireOpen();
    try {
      await page.waitForLoadState('domcontentloaded', { timeout: timeoutMs });
    } catch (error) {
      log.warn({ err: errorMessage(error) }, 'DOM-ready wait timed out');
    }
    try {
      await page.waitForLoadState('networkidle', { timeout: this.options.networkIdleTimeoutMs });
    } catch (error) {
      log.debug({ err: errorMessage(error) }, 'Network never went idle, continuing');
    }
    if (this.options.settleDelayMs > 0) {
      await sleep(this.options.settleDelayMs);
    }
  }

  async querySelectorAll(selector: string): Promise<DomElement[]> {
    const handles = await this.requireOpen().$$(selector);
    return handles.map(wrapHandle);
  }

  async content(): Promise<string> {
    return this.requireOpen().content();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await release('page', () => this.page.close());
    await release('context', () => this.context.close());
    await release('browser', () => this.browser.close());
    log.debug('Browser session closed');
  }

  private requireOpen(): Page {
    if (this.closed) {
      throw new SessionError('Page session is closed');
    }
    return this.page;
  }
}

/**
 * Launch Chromium and open one page configured with the session's
 * User-Agent, headers and TLS policy.
 *
 * Rejects when the browser cannot start; anything opened before the
 * failure is released first.
 */
export async function openPlaywrightSession(options: PageSessionOptions): Promise<PageSession> {
  log.debug({ headless: options.headless, slowMo: options.slowMo }, 'Launching Chromium');
  const browser = await chromium.launch({
    headless: options.headless,
    slowMo: options.slowMo,
  });

  try {
    const context = await browser.newContext({
      userAgent: options.userAgent,
      extraHTTPHeaders: options.headers,
      ignoreHTTPSErrors: !options.verifySsl,
    });
    const page = await context.newPage();
    page.setDefaultTimeout(options.timeoutMs);
    return new PlaywrightSession(browser, context, page, options);
  } catch (error) {
    await release('browser', () => browser.close());
    throw error;
  }
}
