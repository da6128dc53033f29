import { moduleLogger } from '../logger.js';
import type { FilterMode, PdfLinkCandidate } from '../types.js';

const log = moduleLogger('filter');

/** Prefixes that mark figure and table documents. */
export const FIGURE_TABLE_PREFIXES = ['圖', '表', 'figure', 'table'];

/**
 * Whether `value` starts with one of the figure/table prefixes.
 * Latin prefixes compare case-insensitively.
 */
export function hasFigureTablePrefix(value: string): boolean {
  const lower = value.toLowerCase();
  return FIGURE_TABLE_PREFIXES.some((prefix) => lower.startsWith(prefix));
}

/**
 * Whether `value` contains any keyword, case-insensitively.
 */
export function containsKeyword(value: string, keywords: readonly string[]): boolean {
  const lower = value.toLowerCase();
  return keywords.some((keyword) => keyword !== '' && lower.includes(keyword.toLowerCase()));
}

/**
 * Test a set of strings against a filter mode. In `keyword` mode an empty
 * keyword list matches nothing.
 */
export function matchesFilter(
  values: readonly string[],
  mode: FilterMode,
  keywords: readonly string[] = [],
): boolean {
  switch (mode) {
    case 'all':
      return true;
    case 'prefix':
      return values.some(hasFigureTablePrefix);
    case 'keyword':
      return values.some((value) => containsKeyword(value, keywords));
  }
}

/**
 * Select candidates by mode, matching against filename or link text.
 * Input order is preserved.
 */
export function filterCandidates(
  candidates: PdfLinkCandidate[],
  mode: FilterMode,
  keywords: readonly string[] = [],
): PdfLinkCandidate[] {
  if (mode === 'all') {
    return candidates;
  }

  const kept = candidates.filter((c) => matchesFilter([c.filename, c.text], mode, keywords));
  log.info({ mode, keywords, before: candidates.length, after: kept.length }, 'Filtered PDF links');
  return kept;
}
