/**
 * Catalog Resolver Error Types
 *
 * Errors raised inside the resolver's internals. None of them escape a public
 * `list*`/`set*` operation: the resolver converts them into diagnostics.
 */

/**
 * A remote catalog document did not have the expected shape
 *
 * RECOVERY:
 * - The affected product (or the whole catalog, for the top-level document)
 *   is treated as having no data
 * - `issues` carries the first few schema violations for debugging
 */
export class CatalogDocumentError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = 'CatalogDocumentError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CatalogDocumentError);
    }
  }
}

/**
 * A filter pattern failed to compile as a regular expression
 */
export class InvalidPatternError extends Error {
  constructor(
    public readonly pattern: string,
    public readonly reason: string
  ) {
    super(`Invalid regex pattern '${pattern}': ${reason}`);
    this.name = 'InvalidPatternError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidPatternError);
    }
  }
}

/**
 * Render any thrown value as a message string
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/**
 * A pin would break the selection ordering (years → products → geographies/variables)
 *
 * The resolver checks preconditions before pinning; this only fires on misuse
 * of SelectionState directly.
 */
export class SelectionInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SelectionInvariantError';
  }
}
