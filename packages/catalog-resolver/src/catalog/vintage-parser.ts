/**
 * Vintage Parser
 *
 * Turns a catalog entry's raw vintage field into the concrete years it covers.
 *
 * ACCEPTED FORMS:
 * - Integer: 2019
 * - Digit string: "2019"
 * - Inclusive range: "2017-2021" (split on the first hyphen only)
 *
 * Anything else (empty, non-numeric, reversed range, three or more segments)
 * parses to an empty list. Malformed vintages are common upstream and must
 * never abort a catalog listing, so this function does not throw.
 */

import type { YearList } from '../core/types/index.js';

const DIGITS = /^\d+$/;

export function parseVintage(raw: unknown): YearList {
  if (typeof raw === 'number') {
    return Number.isInteger(raw) && raw > 0 ? [raw] : [];
  }

  if (typeof raw !== 'string') return [];

  const text = raw.trim();
  if (text === '') return [];

  const hyphen = text.indexOf('-');
  if (hyphen === -1) {
    const year = parseYearToken(text);
    return year === null ? [] : [year];
  }

  // "2017-2019-2021" leaves "2019-2021" as the end token, which is rejected
  const start = parseYearToken(text.slice(0, hyphen));
  const end = parseYearToken(text.slice(hyphen + 1));
  if (start === null || end === null || start > end) return [];

  const years: number[] = [];
  for (let year = start; year <= end; year++) {
    years.push(year);
  }
  return years;
}

function parseYearToken(token: string): number | null {
  const trimmed = token.trim();
  if (!DIGITS.test(trimmed)) return null;

  const year = Number(trimmed);
  return Number.isSafeInteger(year) && year > 0 ? year : null;
}
