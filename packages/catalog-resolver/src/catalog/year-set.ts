/**
 * Year sets
 *
 * Validation and set arithmetic for the sorted, duplicate-free year lists used
 * throughout the resolver.
 */

import { z } from 'zod';
import type { YearList, YearSet } from '../core/types/index.js';

const YearSchema = z
  .number({ invalid_type_error: 'Years must be numbers' })
  .int('Years must be integers')
  .positive('Years must be positive');

const YearArraySchema = z
  .array(YearSchema, { invalid_type_error: 'Years must be a number or a list of numbers' })
  .nonempty('At least one year is required');

export type YearSetParseResult =
  | { readonly success: true; readonly data: YearSet }
  | { readonly success: false; readonly error: string };

/**
 * Validate a year or list of years and normalize it to a YearSet
 */
export function parseYearSet(input: unknown): YearSetParseResult {
  const candidate = typeof input === 'number' ? [input] : input;
  const result = YearArraySchema.safeParse(candidate);

  if (!result.success) {
    return { success: false, error: result.error.errors[0]?.message ?? 'Invalid years' };
  }

  const [first, ...rest] = toYearList(result.data);
  if (first === undefined) {
    return { success: false, error: 'At least one year is required' };
  }

  return { success: true, data: [first, ...rest] };
}

/**
 * Sort ascending and drop duplicates
 */
export function toYearList(years: Iterable<number>): number[] {
  return [...new Set(years)].sort((a, b) => a - b);
}

/**
 * True when the two lists share at least one year
 */
export function intersects(years: YearList, target: YearList): boolean {
  if (years.length === 0 || target.length === 0) return false;
  const targetSet = new Set(target);
  return years.some((year) => targetSet.has(year));
}

export function sameYears(a: YearList, b: YearList): boolean {
  return a.length === b.length && a.every((year, i) => year === b[i]);
}
