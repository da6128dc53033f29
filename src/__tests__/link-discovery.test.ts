import { describe, it, expect, vi } from "vitest";
import type { DomElement, PageSession } from "../browser/index.js";
import { StaticPageSession, type LoadedPage } from "../browser/static.js";
import {
  discoverPdfLinks,
  discoverPdfLinksDirect,
  resolveHref,
} from "../crawler/link-discovery.js";
import { SessionError } from "../errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const PAGE_URL = "https://site.test/list/";

const LISTING_HTML = `<html><body>
<a href="/files/report.pdf">Annual report PDF</a>
<a href="docs/guide.pdf#page=2">Guide</a>
<a href="/files/report.pdf">Again</a>
<a href="/about">About us</a>
<a href="mailto:office@site.test">PDF by mail</a>
<span>Download PDF <a href="/download?id=7">here</a></span>
<a href="javascript:void(0)">PDF</a>
</body></html>`;

async function openStatic(html: string, status = 200): Promise<StaticPageSession> {
  const loader = vi.fn(async (url: string): Promise<LoadedPage> => ({ status, url, html }));
  const session = new StaticPageSession(loader, { settleDelayMs: 0 });
  await session.navigateTo(PAGE_URL);
  return session;
}

function element(overrides: Partial<DomElement> = {}): DomElement {
  return {
    getAttribute: async () => null,
    textContent: async () => null,
    querySelector: async () => null,
    ...overrides,
  };
}

function fakeSession(query: (selector: string) => Promise<DomElement[]>): PageSession {
  return {
    baseUrl: () => PAGE_URL,
    navigateTo: async () => true,
    awaitSettled: async () => {},
    querySelectorAll: query,
    content: async () => "",
    close: async () => {},
  };
}

// ---------------------------------------------------------------------------
// resolveHref
// ---------------------------------------------------------------------------

describe("resolveHref", () => {
  it("resolves relative hrefs and strips the fragment", () => {
    expect(resolveHref("docs/a.pdf#p=1", PAGE_URL)).toBe("https://site.test/list/docs/a.pdf");
  });

  it("rejects non-http schemes and blank hrefs", () => {
    expect(resolveHref("mailto:a@site.test", PAGE_URL)).toBeUndefined();
    expect(resolveHref("javascript:void(0)", PAGE_URL)).toBeUndefined();
    expect(resolveHref("   ", PAGE_URL)).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// discoverPdfLinks
// ---------------------------------------------------------------------------

describe("discoverPdfLinks", () => {
  it("runs the three passes in order and keeps the first candidate per URL", async () => {
    const session = await openStatic(LISTING_HTML);

    const candidates = await discoverPdfLinks(session);

    expect(candidates).toEqual([
      {
        url: "https://site.test/files/report.pdf",
        text: "Annual report PDF",
        filename: "report.pdf",
        discoveryMethod: "href-text-match",
      },
      {
        url: "https://site.test/list/docs/guide.pdf",
        text: "Guide",
        filename: "guide.pdf",
        discoveryMethod: "href-extension-match",
      },
      {
        url: "https://site.test/download?id=7",
        text: "Download PDF here",
        filename: "Download_PDF_here.pdf",
        discoveryMethod: "element-text-match",
      },
    ]);
    await session.close();
  });

  it("matches the PDF marker case-sensitively", async () => {
    const session = await openStatic(`<html><body><a href="/x">pdf download</a></body></html>`);
    expect(await discoverPdfLinks(session)).toEqual([]);
    await session.close();
  });

  it("collapses whitespace in link text", async () => {
    const session = await openStatic(
      `<html><body><a href="/y">  Big
        PDF  </a></body></html>`,
    );
    const [candidate] = await discoverPdfLinks(session);
    expect(candidate.text).toBe("Big PDF");
    expect(candidate.filename).toBe("Big_PDF.pdf");
    await session.close();
  });

  it("returns an empty list for a page without links", async () => {
    const session = await openStatic("<html><body><p>Nothing here</p></body></html>");
    expect(await discoverPdfLinks(session)).toEqual([]);
    await session.close();
  });

  it("skips an element that fails to read and keeps scanning", async () => {
    const broken = element({
      textContent: async () => "PDF",
      getAttribute: async () => {
        throw new Error("detached");
      },
    });
    const healthy = element({
      textContent: async () => "Report PDF",
      getAttribute: async (name) => (name === "href" ? "/ok.pdf" : null),
    });
    const session = fakeSession(async (selector) => (selector === "a" ? [broken, healthy] : []));

    const candidates = await discoverPdfLinks(session);

    expect(candidates.map((c) => c.url)).toEqual(["https://site.test/ok.pdf"]);
  });

  it("treats a failing query as an empty pass", async () => {
    const session = fakeSession(async (selector) => {
      if (selector === "a") throw new Error("page crashed");
      if (selector === 'a[href*=".pdf"]') {
        return [element({ getAttribute: async () => "/only.pdf", textContent: async () => "x" })];
      }
      return [];
    });

    const candidates = await discoverPdfLinks(session);

    expect(candidates).toHaveLength(1);
    expect(candidates[0].discoveryMethod).toBe("href-extension-match");
  });
});

// ---------------------------------------------------------------------------
// discoverPdfLinksDirect
// ---------------------------------------------------------------------------

describe("discoverPdfLinksDirect", () => {
  it("runs the extension pass before the text pass", async () => {
    const session = await openStatic(LISTING_HTML);

    const candidates = await discoverPdfLinksDirect(session);

    expect(candidates.map((c) => [c.url, c.discoveryMethod])).toEqual([
      ["https://site.test/files/report.pdf", "href-extension-match"],
      ["https://site.test/list/docs/guide.pdf", "href-extension-match"],
    ]);
    await session.close();
  });
});

// ---------------------------------------------------------------------------
// StaticPageSession
// ---------------------------------------------------------------------------

describe("StaticPageSession", () => {
  it("resolves false for a non-OK status", async () => {
    const loader = vi.fn(async (url: string) => ({ status: 404, url, html: "" }));
    const session = new StaticPageSession(loader, { settleDelayMs: 0 });
    expect(await session.navigateTo(PAGE_URL)).toBe(false);
  });

  it("resolves false when the loader fails", async () => {
    const loader = vi.fn(async (): Promise<LoadedPage> => {
      throw new Error("ECONNREFUSED");
    });
    const session = new StaticPageSession(loader, { settleDelayMs: 0 });
    expect(await session.navigateTo(PAGE_URL)).toBe(false);
  });

  it("uses the final URL as base and serializes the document", async () => {
    const session = await openStatic("<html><body><p>hi</p></body></html>");
    expect(session.baseUrl()).toBe(PAGE_URL);
    expect(await session.content()).toBe("<html><head></head><body><p>hi</p></body></html>");
    await session.close();
  });

  it("rejects queries before a page is loaded", async () => {
    const session = new StaticPageSession(vi.fn(), { settleDelayMs: 0 });
    await expect(session.querySelectorAll("a")).rejects.toBeInstanceOf(SessionError);
  });

  it("closes once and refuses navigation afterwards", async () => {
    const onClose = vi.fn(async () => {});
    const loader = vi.fn(async (url: string) => ({ status: 200, url, html: "<p></p>" }));
    const session = new StaticPageSession(loader, { settleDelayMs: 0 }, onClose);

    await session.close();
    await session.close();

    expect(onClose).toHaveBeenCalledTimes(1);
    await expect(session.navigateTo(PAGE_URL)).rejects.toThrow("Page session is closed");
  });
});
