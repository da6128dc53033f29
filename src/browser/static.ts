import { setTimeout as sleep } from 'node:timers/promises';
import { JSDOM } from 'jsdom';

import { errorMessage, SessionError } from '../errors.js';
import { createHttpTransport } from '../fetcher/transport.js';
import { moduleLogger } from '../logger.js';
import type { DomElement, PageSession, PageSessionOptions } from './index.js';

const log = moduleLogger('browser');

/**
 * A fetched HTML document.
 */
export interface LoadedPage {
  status: number;
  /** Final URL after redirects. */
  url: string;
  html: string;
}

/** Fetches the HTML for a URL. */
export type PageLoader = (url: string) => Promise<LoadedPage>;

function wrapElement(element: Element): DomElement {
  return {
    getAttribute: async (name) => element.getAttribute(name),
    textContent: async () => element.textContent,
    querySelector: async (selector) => {
      const child = element.querySelector(selector);
      return child ? wrapElement(child) : null;
    },
  };
}

/**
 * Page session over a plain HTTP fetch parsed with jsdom. Scripts do not
 * run, so only server-rendered links are visible.
 */
export class StaticPageSession implements PageSession {
  private dom: JSDOM | undefined;
  private closed = false;

  constructor(
    private readonly loader: PageLoader,
    private readonly options: Pick<PageSessionOptions, 'settleDelayMs'>,
    private readonly onClose?: () => Promise<void>,
  ) {}

  baseUrl(): string {
    return this.dom?.window.document.baseURI ?? '';
  }

  async navigateTo(url: string): Promise<boolean> {
    this.assertOpen();
    try {
      log.info({ url }, 'Fetching page');
      const page = await this.loader(url);
      if (page.status < 200 || page.status >= 300) {
        log.warn({ url, status: page.status }, 'Page request returned non-OK status');
        return false;
      }
      this.releaseDom();
      this.dom = new JSDOM(page.html, { url: page.url || url });
      return true;
    } catch (error) {
      log.warn({ url, err: errorMessage(error) }, 'Page request failed');
      return false;
    }
  }

  async awaitSettled(): Promise<void> {
    this.assertOpen();
    if (this.options.settleDelayMs > 0) {
      await sleep(this.options.settleDelayMs);
    }
  }

  async querySelectorAll(selector: string): Promise<DomElement[]> {
    const document = this.requireDocument();
    return Array.from(document.querySelectorAll(selector)).map(wrapElement);
  }

  async content(): Promise<string> {
    return this.dom ? this.dom.serialize() : '';
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.releaseDom();
    if (this.onClose) {
      try {
        await this.onClose();
      } catch (error) {
        log.warn({ err: errorMessage(error) }, 'Failed to release page loader');
      }
    }
  }

  private releaseDom(): void {
    this.dom?.window.close();
    this.dom = undefined;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new SessionError('Page session is closed');
    }
  }

  private requireDocument(): Document {
    this.assertOpen();
    if (!this.dom) {
      throw new SessionError('No page loaded; call navigateTo first');
    }
    return this.dom.window.document;
  }
}

async function readText(body: AsyncIterable<Uint8Array> | null): Promise<string> {
  if (!body) return '';
  const decoder = new TextDecoder();
  let text = '';
  for await (const chunk of body) {
    text += decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}

/**
 * Open a static session. Without a loader, pages are fetched over HTTP
 * with the session's User-Agent, headers and TLS policy.
 */
export async function openStaticSession(
  options: PageSessionOptions,
  loader?: PageLoader,
): Promise<PageSession> {
  if (loader) {
    return new StaticPageSession(loader, options);
  }

  const transport = createHttpTransport({
    timeoutMs: options.timeoutMs,
    verifySsl: options.verifySsl,
    userAgent: options.userAgent,
    headers: options.headers,
  });
  const httpLoader: PageLoader = async (url) => {
    const response = await transport.get(url);
    return { status: response.statusCode, url: response.url, html: await readText(response.body) };
  };
  return new StaticPageSession(httpLoader, options, () => transport.close());
}
