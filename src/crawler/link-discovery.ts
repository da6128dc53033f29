import type { DomElement, PageSession } from '../browser/index.js';
import { errorMessage } from '../errors.js';
import { moduleLogger } from '../logger.js';
import type { DiscoveryMethod, PdfLinkCandidate } from '../types.js';
import { extractFilename } from '../url/index.js';

const log = moduleLogger('discovery');

/** Literal marker looked for in link and element text. */
export const PDF_MARKER = 'PDF';

const ANCHOR_SELECTOR = 'a';
const PDF_HREF_SELECTOR = 'a[href*=".pdf"]';
const CONTAINER_SELECTOR = 'button, div, span';

/**
 * Candidates keyed by resolved URL; the first candidate for a URL wins.
 */
class CandidateSet {
  private readonly byUrl = new Map<string, PdfLinkCandidate>();

  has(url: string): boolean {
    return this.byUrl.has(url);
  }

  add(candidate: PdfLinkCandidate): boolean {
    if (this.byUrl.has(candidate.url)) return false;
    this.byUrl.set(candidate.url, candidate);
    return true;
  }

  get size(): number {
    return this.byUrl.size;
  }

  toArray(): PdfLinkCandidate[] {
    return [...this.byUrl.values()];
  }
}

/**
 * Resolve an href against the page URL. Returns undefined for anything
 * that is not an absolute http(s) URL afterwards.
 */
export function resolveHref(href: string, baseUrl: string): string | undefined {
  const trimmed = href.trim();
  if (!trimmed) return undefined;
  try {
    const resolved = baseUrl ? new URL(trimmed, baseUrl) : new URL(trimmed);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return undefined;
    }
    resolved.hash = '';
    return resolved.href;
  } catch {
    return undefined;
  }
}

function cleanText(text: string | null): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

async function candidateFromAnchor(
  anchor: DomElement,
  baseUrl: string,
  method: DiscoveryMethod,
  text: string,
): Promise<PdfLinkCandidate | undefined> {
  const href = await anchor.getAttribute('href');
  if (!href) return undefined;
  const url = resolveHref(href, baseUrl);
  if (!url) return undefined;
  return { url, text, filename: extractFilename(url, text), discoveryMethod: method };
}

type ElementVisitor = (element: DomElement) => Promise<PdfLinkCandidate | undefined>;

/**
 * Run one discovery pass. A failure on one element is logged and the pass
 * moves on; a failing query ends only this pass.
 */
async function runPass(
  session: PageSession,
  selector: string,
  method: DiscoveryMethod,
  found: CandidateSet,
  visit: ElementVisitor,
): Promise<number> {
  let elements: DomElement[];
  try {
    elements = await session.querySelectorAll(selector);
  } catch (error) {
    log.warn({ method, selector, err: errorMessage(error) }, 'Discovery query failed');
    return 0;
  }

  let added = 0;
  for (const element of elements) {
    try {
      const candidate = await visit(element);
      if (candidate && found.add(candidate)) {
        added++;
        log.debug({ method, url: candidate.url, text: candidate.text }, 'Found PDF link');
      }
    } catch (error) {
      log.warn({ method, err: errorMessage(error) }, 'Skipping element that failed to read');
    }
  }

  log.debug({ method, scanned: elements.length, added }, 'Discovery pass finished');
  return added;
}

function textMatchPass(session: PageSession, found: CandidateSet): Promise<number> {
  const baseUrl = session.baseUrl();
  return runPass(session, ANCHOR_SELECTOR, 'href-text-match', found, async (anchor) => {
    const text = cleanText(await anchor.textContent());
    if (!text.includes(PDF_MARKER)) return undefined;
    return candidateFromAnchor(anchor, baseUrl, 'href-text-match', text);
  });
}

function extensionMatchPass(session: PageSession, found: CandidateSet): Promise<number> {
  const baseUrl = session.baseUrl();
  return runPass(session, PDF_HREF_SELECTOR, 'href-extension-match', found, async (anchor) => {
    const text = cleanText(await anchor.textContent());
    return candidateFromAnchor(anchor, baseUrl, 'href-extension-match', text);
  });
}

function elementTextPass(session: PageSession, found: CandidateSet): Promise<number> {
  const baseUrl = session.baseUrl();
  return runPass(session, CONTAINER_SELECTOR, 'element-text-match', found, async (element) => {
    const text = cleanText(await element.textContent());
    if (!text.includes(PDF_MARKER)) return undefined;
    const anchor = await element.querySelector('a');
    if (!anchor) return undefined;
    return candidateFromAnchor(anchor, baseUrl, 'element-text-match', text);
  });
}

/**
 * Collect PDF link candidates from a loaded page.
 *
 * Three passes run in order: anchors whose text contains "PDF", anchors
 * whose href contains ".pdf", and button/div/span elements whose text
 * contains "PDF" and that wrap an anchor. Candidates are deduplicated by
 * resolved URL, keeping the first.
 */
export async function discoverPdfLinks(session: PageSession): Promise<PdfLinkCandidate[]> {
  const found = new CandidateSet();

  await textMatchPass(session, found);
  await extensionMatchPass(session, found);
  await elementTextPass(session, found);

  log.info({ count: found.size }, 'PDF link discovery finished');
  return found.toArray();
}

/**
 * Re-run the anchor passes against the page with fresh queries, href
 * extension first. Used when {@link discoverPdfLinks} finds nothing.
 */
export async function discoverPdfLinksDirect(session: PageSession): Promise<PdfLinkCandidate[]> {
  const found = new CandidateSet();

  await extensionMatchPass(session, found);
  await textMatchPass(session, found);

  log.info({ count: found.size }, 'Direct PDF link discovery finished');
  return found.toArray();
}
