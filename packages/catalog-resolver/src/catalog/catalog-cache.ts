/**
 * Catalog Cache
 *
 * Process-lifetime cache of the product catalog plus the "last listed" views
 * that `set*` calls without arguments pin from.
 *
 * INVALIDATION POINTS:
 * - Product catalog: written once, on the first successful load; never invalidated
 * - Last products view: overwritten by every successful product listing
 * - Last geographies / variables views: overwritten by every successful listing
 *   of that kind, and cleared when the pinned product set changes
 *
 * SINGLE FLIGHT: concurrent `getProducts()` calls made while a load is in
 * flight share that load. A failed load leaves the cache empty so the next
 * call retries.
 */

import type { GeographyLevel, Outcome, Product, Variable } from '../core/types/index.js';

export type CatalogLoader = () => Promise<Outcome<readonly Product[]>>;

export class CatalogCache {
  private products: readonly Product[] | null = null;
  private inflight: Promise<Outcome<readonly Product[]>> | null = null;

  private lastProducts: readonly Product[] = [];
  private lastGeographies: readonly GeographyLevel[] = [];
  private lastVariables: readonly Variable[] = [];

  constructor(private readonly loader: CatalogLoader) {}

  get isLoaded(): boolean {
    return this.products !== null;
  }

  /**
   * Cached catalog, loading it on first use
   *
   * Warnings from the load are only reported to the call that triggered it
   * (and any calls that joined it); later hits return none.
   */
  async getProducts(): Promise<Outcome<readonly Product[]>> {
    if (this.products !== null) {
      return { success: true, data: this.products, warnings: [] };
    }

    if (!this.inflight) {
      this.inflight = this.loader()
        .then((outcome) => {
          if (outcome.success) {
            this.products = outcome.data;
          }
          return outcome;
        })
        .finally(() => {
          this.inflight = null;
        });
    }

    return this.inflight;
  }

  // ==========================================================================
  // Last-listed views
  // ==========================================================================

  get productsView(): readonly Product[] {
    return this.lastProducts;
  }

  set productsView(products: readonly Product[]) {
    this.lastProducts = Object.freeze([...products]);
  }

  get geographiesView(): readonly GeographyLevel[] {
    return this.lastGeographies;
  }

  set geographiesView(levels: readonly GeographyLevel[]) {
    this.lastGeographies = Object.freeze([...levels]);
  }

  get variablesView(): readonly Variable[] {
    return this.lastVariables;
  }

  set variablesView(variables: readonly Variable[]) {
    this.lastVariables = Object.freeze([...variables]);
  }

  /**
   * Drop views derived from the pinned products
   */
  clearDerivedViews(): void {
    this.lastGeographies = [];
    this.lastVariables = [];
  }
}
