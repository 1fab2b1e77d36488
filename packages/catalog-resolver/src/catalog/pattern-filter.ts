/**
 * Pattern Filter
 *
 * Case-insensitive regular-expression filtering over one text field of a
 * record, with the patterns combined conjunctively (every pattern matches) or
 * disjunctively (at least one matches). Matching is a search, not a full-string
 * match, so anchors must be written into the pattern.
 *
 * FAIL-CLOSED: if any pattern fails to compile, the whole filtering step fails.
 * Patterns are never partially applied.
 */

import { InvalidPatternError } from '../core/errors.js';
import { MatchLogic } from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'pattern-filter' });

export type PatternInput = string | readonly string[];

export type TextMatcher = (text: string) => boolean;

export type MatcherResult =
  | { readonly success: true; readonly matcher: TextMatcher | null }
  | { readonly success: false; readonly error: InvalidPatternError };

export function normalizePatterns(patterns?: PatternInput): readonly string[] {
  if (patterns === undefined) return [];
  return typeof patterns === 'string' ? [patterns] : patterns;
}

/**
 * Compile every pattern with the `i` flag
 *
 * @throws {InvalidPatternError} On the first pattern that does not compile
 */
export function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern, 'i');
    } catch (error) {
      throw new InvalidPatternError(pattern, error instanceof Error ? error.message : String(error));
    }
  });
}

/**
 * Build a matcher for the given patterns. `matcher` is null when there are no
 * patterns, meaning "no filtering".
 */
export function createMatcher(
  patterns?: PatternInput,
  logic: MatchLogic = MatchLogic.CONJUNCTIVE
): MatcherResult {
  const sources = normalizePatterns(patterns);
  if (sources.length === 0) {
    return { success: true, matcher: null };
  }

  let regexes: RegExp[];
  try {
    regexes = compilePatterns(sources);
  } catch (error) {
    if (error instanceof InvalidPatternError) {
      log.error('Invalid regex pattern', { pattern: error.pattern, reason: error.reason });
      return { success: false, error };
    }
    throw error;
  }

  const matcher: TextMatcher =
    logic === MatchLogic.DISJUNCTIVE
      ? (text) => text !== '' && regexes.some((regex) => regex.test(text))
      : (text) => text !== '' && regexes.every((regex) => regex.test(text));

  return { success: true, matcher };
}

/**
 * Keep the items whose text satisfies `matcher`; a null matcher keeps all
 */
export function applyMatcher<T>(
  items: readonly T[],
  text: (item: T) => string,
  matcher: TextMatcher | null
): T[] {
  if (matcher === null) {
    return [...items];
  }

  return items.filter((item) => matcher(text(item)));
}
