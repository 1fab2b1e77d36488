/**
 * Diagnostics and Result Types
 *
 * Listing and selection operations never throw. They report outcomes as
 * values: a payload plus the diagnostics collected while producing it.
 */

export type DiagnosticSeverity = 'error' | 'warning';

export type DiagnosticCode =
  | 'INVALID_YEARS'
  | 'INVALID_PATTERN'
  | 'CATALOG_UNAVAILABLE'
  | 'FETCH_FAILED'
  | 'MALFORMED_RECORD'
  | 'NO_PRODUCTS_SELECTED'
  | 'EMPTY_VIEW'
  | 'NO_MATCH'
  | 'UNMATCHED_IDENTIFIER'
  | 'AMBIGUOUS_TITLE'
  | 'UNAVAILABLE_FOR_YEARS'
  | 'SELECTION_CHANGED';

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

/**
 * Result of a `list*` call. `items` is empty whenever an error diagnostic is present.
 */
export interface Listing<T> {
  readonly items: readonly T[];
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Payload or failure, with the non-fatal warnings gathered either way
 */
export type Outcome<T> =
  | { readonly success: true; readonly data: T; readonly warnings: readonly Diagnostic[] }
  | { readonly success: false; readonly error: Diagnostic; readonly warnings: readonly Diagnostic[] };

/**
 * Result of a `set*` call. On failure the selection state was left untouched.
 */
export type SelectionResult<T> = Outcome<T>;

export function succeed<T>(data: T, warnings: readonly Diagnostic[] = []): Outcome<T> {
  return { success: true, data, warnings };
}

export function fail(error: Diagnostic, warnings: readonly Diagnostic[] = []): Outcome<never> {
  return { success: false, error, warnings };
}

export function errorDiagnostic(
  code: DiagnosticCode,
  message: string,
  details?: Readonly<Record<string, unknown>>
): Diagnostic {
  return details ? { severity: 'error', code, message, details } : { severity: 'error', code, message };
}

export function warningDiagnostic(
  code: DiagnosticCode,
  message: string,
  details?: Readonly<Record<string, unknown>>
): Diagnostic {
  return details ? { severity: 'warning', code, message, details } : { severity: 'warning', code, message };
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
