/**
 * Selection State
 *
 * The pinned selection handed to the bulk-fetch stage:
 * years → products → geographies / variables.
 *
 * INVARIANTS:
 * - Geographies and variables can only be pinned while products are pinned
 * - Pinning a new product set clears geographies and variables
 * - Every pin stores its own frozen copy; later listings cannot alter it
 */

import { SelectionInvariantError } from '../core/errors.js';
import type {
  GeographyLevel,
  Product,
  Variable,
  YearList,
  YearSet,
} from '../core/types/index.js';
import { sameYears } from '../catalog/year-set.js';

export interface SelectionSnapshot {
  readonly years: YearSet | null;
  readonly products: readonly Product[];
  readonly geographies: readonly GeographyLevel[];
  readonly variables: readonly Variable[];
}

/**
 * Variable names pinned for one product vintage
 */
export interface ProductVariableGroup {
  readonly product: string;
  readonly years: YearList;
  readonly accessURL: string;
  readonly variables: readonly string[];
}

export class SelectionState {
  private years: YearSet | null = null;
  private products: readonly Product[] = [];
  private geographies: readonly GeographyLevel[] = [];
  private variables: readonly Variable[] = [];

  get hasProducts(): boolean {
    return this.products.length > 0;
  }

  getYears(): YearSet | null {
    return this.years;
  }

  getProducts(): readonly Product[] {
    return this.products;
  }

  setYears(years: YearSet): void {
    this.years = years;
  }

  pinProducts(products: readonly Product[]): void {
    if (products.length === 0) {
      throw new SelectionInvariantError('Cannot pin an empty product set');
    }

    this.products = Object.freeze([...products]);
    this.geographies = [];
    this.variables = [];
  }

  pinGeographies(levels: readonly GeographyLevel[]): void {
    this.requireProducts('geographies');
    this.geographies = Object.freeze([...levels]);
  }

  pinVariables(variables: readonly Variable[]): void {
    this.requireProducts('variables');
    this.variables = Object.freeze([...variables]);
  }

  snapshot(): SelectionSnapshot {
    return Object.freeze({
      years: this.years,
      products: this.products,
      geographies: this.geographies,
      variables: this.variables,
    });
  }

  private requireProducts(stage: string): void {
    if (!this.hasProducts) {
      throw new SelectionInvariantError(`Cannot pin ${stage} before any product is pinned`);
    }
  }
}

/**
 * Group the pinned variables by the pinned product vintage they apply to
 *
 * Products with no pinned variables still appear, with an empty list.
 */
export function groupVariablesByProduct(snapshot: SelectionSnapshot): ProductVariableGroup[] {
  return snapshot.products.map((product) => ({
    product: product.title,
    years: product.vintageYears,
    accessURL: product.accessURL,
    variables: snapshot.variables
      .filter((variable) =>
        variable.appliesTo.some(
          (entry) => entry.product === product.title && sameYears(entry.years, product.vintageYears)
        )
      )
      .map((variable) => variable.name),
  }));
}

/**
 * Union of required parent levels per distinct geography description
 *
 * Advisory: the bulk-fetch stage decides how to honor it.
 */
export function collectParentRequirements(
  levels: readonly GeographyLevel[]
): ReadonlyMap<string, readonly string[]> {
  const requirements = new Map<string, string[]>();

  for (const level of levels) {
    const union = requirements.get(level.description) ?? [];
    for (const parent of level.requiredParentLevels ?? []) {
      if (!union.includes(parent)) union.push(parent);
    }
    requirements.set(level.description, union);
  }

  return requirements;
}
