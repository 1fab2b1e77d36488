/**
 * Catalog Record Types
 *
 * Typed records for the three levels of the catalog hierarchy:
 * products (datasets) → geography levels → variables.
 *
 * Year collections are sorted ascending and deduplicated. Records handed out
 * by the resolver are frozen; nothing downstream can mutate a cached view or
 * a pinned selection through them.
 */

/**
 * Sorted (ascending), duplicate-free list of positive integer years
 */
export type YearList = readonly number[];

/**
 * Non-empty YearList. Only produced by `parseYearSet()`.
 */
export type YearSet = readonly [number, ...number[]];

/**
 * How multiple filter patterns combine
 */
export enum MatchLogic {
  /** Every pattern must match */
  CONJUNCTIVE = 'all',
  /** At least one pattern must match */
  DISJUNCTIVE = 'any',
}

/**
 * One selectable dataset definition from the catalog
 */
export interface Product {
  readonly title: string;
  readonly description: string;
  /** Dataset path, e.g. `acs/acs5` */
  readonly name: string;
  /** Years the product covers; empty when the catalog vintage is unparseable */
  readonly vintageYears: YearList;
  readonly datasetType: string;
  /** Base endpoint of the product's geography and variable sub-resources */
  readonly accessURL: string;
  readonly isMicrodata: boolean;
  readonly isAggregate: boolean;
}

/**
 * Provenance entry on a consolidated record
 */
export interface AppliesTo {
  /** Product title */
  readonly product: string;
  readonly years: YearList;
}

export interface GeographyLevel {
  /** Summary level code, e.g. `040`. Natural key for consolidation. */
  readonly levelCode: string;
  readonly description: string;
  readonly appliesTo: readonly AppliesTo[];
  /** Parent levels that must be qualified when querying this level, or null */
  readonly requiredParentLevels: readonly string[] | null;
}

export interface Variable {
  /** Natural key for consolidation */
  readonly name: string;
  readonly label: string;
  readonly concept: string;
  readonly group: string;
  readonly appliesTo: readonly AppliesTo[];
}

/**
 * Variable names that are query parameters, not data
 */
export const RESERVED_VARIABLE_NAMES: ReadonlySet<string> = new Set(['GEO_ID', 'for', 'in']);
