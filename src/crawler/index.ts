export { PdfCrawler, crawlPdfs } from './pdf-crawler.js';
export type { PdfCrawlerDeps } from './pdf-crawler.js';
export {
  discoverPdfLinks,
  discoverPdfLinksDirect,
  resolveHref,
  PDF_MARKER,
} from './link-discovery.js';
export {
  filterCandidates,
  matchesFilter,
  hasFigureTablePrefix,
  containsKeyword,
  FIGURE_TABLE_PREFIXES,
} from './filter.js';
export { formatReport, saveReport } from './report.js';
