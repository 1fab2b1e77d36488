/**
 * Census Catalog Resolver
 *
 * Progressive narrowing of the catalog down to a pinned selection:
 *
 *   setYears → listProducts → setProducts → listGeographies / listVariables
 *            → setGeographies / setVariables → getSelection
 *
 * PHILOSOPHY:
 * - Fetch the product catalog once per resolver; re-filtering is local
 * - Fan out to per-product geography/variable documents one product at a time;
 *   a product that fails to load is reported and skipped, never fatal
 * - Listing and selection never throw: outcomes and diagnostics are values,
 *   and a failed `set*` leaves the selection exactly as it was
 * - A geography/variable listing or pin whose products were replaced while it
 *   waited on its fetches is discarded with SELECTION_CHANGED
 */

import { DEFAULT_RESOLVER_CONFIG, getApiKeyFromEnv, loadConfigFromEnv, type ResolverConfig } from '../core/config.js';
import { HTTPClient, type CatalogTransport } from '../core/http-client.js';
import {
  MatchLogic,
  errorDiagnostic,
  fail,
  succeed,
  warningDiagnostic,
  type Diagnostic,
  type GeographyLevel,
  type Listing,
  type Outcome,
  type Product,
  type SelectionResult,
  type Variable,
  type YearList,
  type YearSet,
} from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import { CatalogCache } from '../catalog/catalog-cache.js';
import { CatalogSource } from '../catalog/catalog-source.js';
import {
  consolidateGeographies,
  consolidateVariables,
  type ProductRecords,
} from '../catalog/consolidator.js';
import type { ProductGeography, ProductVariable } from '../catalog/records.js';
import {
  applyMatcher,
  createMatcher,
  normalizePatterns,
  type PatternInput,
  type TextMatcher,
} from '../catalog/pattern-filter.js';
import { intersects, parseYearSet } from '../catalog/year-set.js';
import {
  SelectionState,
  collectParentRequirements,
  groupVariablesByProduct,
  type ProductVariableGroup,
  type SelectionSnapshot,
} from './selection-state.js';

const log = createLogger({ module: 'catalog-resolver' });

// ============================================================================
// Options
// ============================================================================

export interface CatalogResolverOptions {
  /** Initial years, applied through `setYears()` */
  readonly years?: number | readonly number[];
  /** Optional API key; attached as the `key` query parameter */
  readonly apiKey?: string | null;
  /** Document source (default: HTTPClient built from `config.http`) */
  readonly transport?: CatalogTransport;
  readonly config?: Partial<ResolverConfig>;
}

export interface ListOptions {
  /** Case-insensitive regex pattern(s) */
  readonly patterns?: PatternInput;
  /** How multiple patterns combine (default: CONJUNCTIVE) */
  readonly logic?: MatchLogic;
}

export interface ProductListOptions extends ListOptions {
  /**
   * Years to filter on. Falls back to the selected years when omitted.
   * An empty list disables year filtering.
   */
  readonly years?: number | readonly number[];
}

export type GeographyMatchField = 'code' | 'description';

export interface GeographySelection {
  readonly levels: readonly GeographyLevel[];
  /** Description → union of required parent levels across the pinned products */
  readonly parentRequirements: ReadonlyMap<string, readonly string[]>;
}

export interface ResolvedSelection extends SelectionSnapshot {
  variablesByProduct(): ProductVariableGroup[];
}

// ============================================================================
// Resolver
// ============================================================================

export class CensusCatalogResolver {
  private readonly cache: CatalogCache;
  private readonly source: CatalogSource;
  private readonly state = new SelectionState();
  private apiKey: string | null = null;

  constructor(options: CatalogResolverOptions = {}) {
    const config: ResolverConfig = { ...DEFAULT_RESOLVER_CONFIG, ...options.config };
    const transport = options.transport ?? new HTTPClient(config.http);

    this.source = new CatalogSource(transport, config, () => this.apiKey);
    this.cache = new CatalogCache(() => this.source.fetchProducts());

    if (options.apiKey !== undefined) {
      this.loadKey(options.apiKey);
    }

    if (options.years !== undefined) {
      this.setYears(options.years);
    }
  }

  /**
   * Resolver configured from CENSUS_* environment variables
   */
  static fromEnv(
    env: Readonly<Record<string, string | undefined>> = process.env,
    options: Omit<CatalogResolverOptions, 'config' | 'apiKey'> = {}
  ): CensusCatalogResolver {
    return new CensusCatalogResolver({
      ...options,
      config: loadConfigFromEnv(env),
      apiKey: getApiKeyFromEnv(env),
    });
  }

  // ==========================================================================
  // Years and credentials
  // ==========================================================================

  setYears(years: number | readonly number[]): SelectionResult<YearSet> {
    const parsed = parseYearSet(years);
    if (!parsed.success) {
      return this.reject(errorDiagnostic('INVALID_YEARS', parsed.error, { years }));
    }

    this.state.setYears(parsed.data);
    log.info('Years set', { years: parsed.data });
    return succeed(parsed.data);
  }

  loadKey(key?: string | null): void {
    const trimmed = key?.trim();
    if (trimmed) {
      this.apiKey = trimmed;
      log.info('API key loaded');
      return;
    }

    this.apiKey = null;
    log.warn('No API key provided; requests may hit stricter rate limits');
  }

  get hasApiKey(): boolean {
    return this.apiKey !== null;
  }

  // ==========================================================================
  // Products
  // ==========================================================================

  async listProducts(options: ProductListOptions = {}): Promise<Listing<Product>> {
    const target = this.resolveTargetYears(options.years);
    if (!target.success) return this.emptyListing(target.error);

    const compiled = this.compile(options);
    if (!compiled.success) return this.emptyListing(compiled.error);

    const catalog = await this.cache.getProducts();
    if (!catalog.success) return this.emptyListing(catalog.error, catalog.warnings);

    const targetYears = target.data;
    const inYears =
      targetYears === null
        ? catalog.data
        : catalog.data.filter((product) => intersects(product.vintageYears, targetYears));
    const items = applyMatcher(inYears, (product) => product.title, compiled.data);

    this.cache.productsView = items;
    log.debug('Products listed', { count: items.length, years: targetYears });
    return { items: this.cache.productsView, diagnostics: catalog.warnings };
  }

  async listProductTitles(options: ProductListOptions = {}): Promise<Listing<string>> {
    const listing = await this.listProducts(options);
    return { items: listing.items.map((product) => product.title), diagnostics: listing.diagnostics };
  }

  /**
   * Pin products by exact title, or the last product listing when omitted
   *
   * Titles are resolved against the catalog restricted to the selected years.
   * A title shared by several vintages pins all of them; unmatched titles are
   * skipped with a warning.
   */
  async setProducts(titles?: string | readonly string[]): Promise<SelectionResult<readonly Product[]>> {
    if (titles === undefined) {
      const view = this.cache.productsView;
      if (view.length === 0) {
        return this.reject(
          errorDiagnostic('EMPTY_VIEW', 'No listed products to pin; call listProducts() first')
        );
      }
      return this.pinProducts(view, []);
    }

    const requested = normalizePatterns(titles);
    const catalog = await this.cache.getProducts();
    if (!catalog.success) return this.reject(catalog.error, catalog.warnings);

    const years = this.state.getYears();
    const candidates =
      years === null ? catalog.data : catalog.data.filter((p) => intersects(p.vintageYears, years));

    const warnings: Diagnostic[] = [...catalog.warnings];
    const selected = new Map<string, Product>();

    for (const title of requested) {
      const matches = candidates.filter((product) => product.title === title);
      if (matches.length === 0) {
        warnings.push(this.warn('UNMATCHED_IDENTIFIER', `No product titled '${title}'`, { title, years }));
        continue;
      }
      for (const product of matches) {
        selected.set(product.accessURL, product);
      }
    }

    if (selected.size === 0) {
      return this.reject(
        errorDiagnostic('NO_MATCH', 'None of the requested product titles matched', {
          titles: requested,
          years,
        }),
        warnings
      );
    }

    return this.pinProducts([...selected.values()], warnings);
  }

  /**
   * Pin exactly one product by title
   *
   * With years selected, the first vintage overlapping them wins. Without
   * years, a title shared by several vintages is ambiguous and rejected.
   */
  async setProduct(title: string): Promise<SelectionResult<Product>> {
    const catalog = await this.cache.getProducts();
    if (!catalog.success) return this.reject(catalog.error, catalog.warnings);

    const matches = catalog.data.filter((product) => product.title === title);
    if (matches.length === 0) {
      return this.reject(errorDiagnostic('NO_MATCH', `No product titled '${title}'`, { title }));
    }

    const years = this.state.getYears();
    let found: Product | undefined;

    if (years !== null) {
      found = matches.find((product) => intersects(product.vintageYears, years));
      if (!found) {
        return this.reject(
          errorDiagnostic('UNAVAILABLE_FOR_YEARS', `Product '${title}' is not available for ${years.join(', ')}`, {
            title,
            years,
          })
        );
      }
    } else {
      if (matches.length > 1) {
        const vintages = [...new Set(matches.flatMap((product) => product.vintageYears))].sort((a, b) => a - b);
        return this.reject(
          errorDiagnostic(
            'AMBIGUOUS_TITLE',
            `Product '${title}' exists for multiple vintages (${vintages.join(', ')}); set years first`,
            { title, vintages }
          )
        );
      }
      found = matches[0];
    }

    if (!found) {
      return this.reject(errorDiagnostic('NO_MATCH', `No product titled '${title}'`, { title }));
    }

    const pinned = this.pinProducts([found], catalog.warnings);
    return succeed(found, pinned.warnings);
  }

  // ==========================================================================
  // Geographies
  // ==========================================================================

  async listGeographies(options: ListOptions = {}): Promise<Listing<GeographyLevel>> {
    const products = this.state.getProducts();
    if (products.length === 0) {
      return this.emptyListing(this.noProductsDiagnostic('geographies'));
    }

    const compiled = this.compile(options);
    if (!compiled.success) return this.emptyListing(compiled.error);

    const collected = await this.collectGeographies(products);
    if (this.productsChangedSince(products)) {
      return this.emptyListing(this.selectionChangedDiagnostic('geographies'), collected.warnings);
    }

    const items = applyMatcher(collected.data, (level) => level.description, compiled.data);

    this.cache.geographiesView = items;
    return { items: this.cache.geographiesView, diagnostics: collected.warnings };
  }

  async listGeographyCodes(options: ListOptions = {}): Promise<Listing<string>> {
    const listing = await this.listGeographies(options);
    return { items: listing.items.map((level) => level.levelCode), diagnostics: listing.diagnostics };
  }

  /**
   * Pin geography levels by code (default) or description, or the last
   * geography listing when omitted
   *
   * Explicit values are matched against a fresh, unfiltered listing.
   * Description matching ignores case.
   */
  async setGeographies(
    values?: string | readonly string[],
    options: { readonly by?: GeographyMatchField } = {}
  ): Promise<SelectionResult<GeographySelection>> {
    const products = this.state.getProducts();
    if (products.length === 0) {
      return this.reject(this.noProductsDiagnostic('geographies'));
    }

    if (values === undefined) {
      const view = this.cache.geographiesView;
      if (view.length === 0) {
        return this.reject(
          errorDiagnostic('EMPTY_VIEW', 'No listed geographies to pin; call listGeographies() first')
        );
      }
      return this.pinGeographies(view, []);
    }

    const by = options.by ?? 'code';
    const requested = normalizePatterns(values);
    const collected = await this.collectGeographies(products);
    const warnings: Diagnostic[] = [...collected.warnings];
    if (this.productsChangedSince(products)) {
      return this.reject(this.selectionChangedDiagnostic('geographies'), warnings);
    }
    const selected = new Map<string, GeographyLevel>();

    for (const value of requested) {
      const wanted = value.toLowerCase();
      const matches = collected.data.filter((level) =>
        by === 'code' ? level.levelCode === value : level.description.toLowerCase() === wanted
      );

      if (matches.length === 0) {
        warnings.push(
          this.warn('UNMATCHED_IDENTIFIER', `No geography with ${by} '${value}' for the selected products`, {
            value,
            by,
          })
        );
        continue;
      }
      for (const level of matches) {
        selected.set(level.levelCode, level);
      }
    }

    if (selected.size === 0) {
      return this.reject(
        errorDiagnostic('NO_MATCH', 'None of the requested geographies matched', { values: requested, by }),
        warnings
      );
    }

    return this.pinGeographies([...selected.values()], warnings);
  }

  // ==========================================================================
  // Variables
  // ==========================================================================

  async listVariables(options: ListOptions = {}): Promise<Listing<Variable>> {
    const products = this.state.getProducts();
    if (products.length === 0) {
      return this.emptyListing(this.noProductsDiagnostic('variables'));
    }

    const compiled = this.compile(options);
    if (!compiled.success) return this.emptyListing(compiled.error);

    const collected = await this.collectVariables(products);
    if (this.productsChangedSince(products)) {
      return this.emptyListing(this.selectionChangedDiagnostic('variables'), collected.warnings);
    }

    const items = applyMatcher(collected.data, (variable) => variable.label, compiled.data);

    this.cache.variablesView = items;
    return { items: this.cache.variablesView, diagnostics: collected.warnings };
  }

  async listVariableNames(options: ListOptions = {}): Promise<Listing<string>> {
    const listing = await this.listVariables(options);
    return { items: listing.items.map((variable) => variable.name), diagnostics: listing.diagnostics };
  }

  /**
   * Pin variables by name, or the last variable listing when omitted
   */
  async setVariables(names?: string | readonly string[]): Promise<SelectionResult<readonly Variable[]>> {
    const products = this.state.getProducts();
    if (products.length === 0) {
      return this.reject(this.noProductsDiagnostic('variables'));
    }

    if (names === undefined) {
      const view = this.cache.variablesView;
      if (view.length === 0) {
        return this.reject(
          errorDiagnostic('EMPTY_VIEW', 'No listed variables to pin; call listVariables() first')
        );
      }
      return this.pinVariables(view, []);
    }

    const requested = normalizePatterns(names);
    const collected = await this.collectVariables(products);
    if (this.productsChangedSince(products)) {
      return this.reject(this.selectionChangedDiagnostic('variables'), collected.warnings);
    }

    const byName = new Map(collected.data.map((variable) => [variable.name, variable]));
    const warnings: Diagnostic[] = [...collected.warnings];
    const selected = new Map<string, Variable>();

    for (const name of requested) {
      const variable = byName.get(name);
      if (!variable) {
        warnings.push(
          this.warn('UNMATCHED_IDENTIFIER', `No variable named '${name}' for the selected products`, {
            name,
          })
        );
        continue;
      }
      selected.set(name, variable);
    }

    if (selected.size === 0) {
      return this.reject(
        errorDiagnostic('NO_MATCH', 'None of the requested variables matched', { names: requested }),
        warnings
      );
    }

    return this.pinVariables([...selected.values()], warnings);
  }

  // ==========================================================================
  // Selection
  // ==========================================================================

  getSelection(): ResolvedSelection {
    const snapshot = this.state.snapshot();
    return Object.freeze({
      ...snapshot,
      variablesByProduct: () => groupVariablesByProduct(snapshot),
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Explicit years win; an empty list means "no year filter"; otherwise the selected years
   */
  private resolveTargetYears(years: number | readonly number[] | undefined): Outcome<YearList | null> {
    if (years === undefined) return succeed(this.state.getYears());
    if (typeof years !== 'number' && years.length === 0) return succeed(null);

    const parsed = parseYearSet(years);
    if (!parsed.success) {
      return fail(errorDiagnostic('INVALID_YEARS', parsed.error, { years }));
    }
    return succeed(parsed.data);
  }

  private compile(options: ListOptions): Outcome<TextMatcher | null> {
    const compiled = createMatcher(options.patterns, options.logic ?? MatchLogic.CONJUNCTIVE);
    if (!compiled.success) {
      return fail(
        errorDiagnostic('INVALID_PATTERN', compiled.error.message, {
          pattern: compiled.error.pattern,
          reason: compiled.error.reason,
        })
      );
    }
    return succeed(compiled.matcher);
  }

  /**
   * Sequential fan-out; a product that fails contributes a warning and no records
   */
  private async collectGeographies(products: readonly Product[]): Promise<{
    data: GeographyLevel[];
    warnings: Diagnostic[];
  }> {
    const sources: ProductRecords<ProductGeography>[] = [];
    const warnings: Diagnostic[] = [];

    for (const product of products) {
      const outcome = await this.source.fetchGeographies(product);
      warnings.push(...outcome.warnings);
      if (!outcome.success) {
        warnings.push(outcome.error);
        continue;
      }
      sources.push({ product, records: outcome.data });
    }

    return { data: consolidateGeographies(sources), warnings };
  }

  private async collectVariables(products: readonly Product[]): Promise<{
    data: Variable[];
    warnings: Diagnostic[];
  }> {
    const sources: ProductRecords<ProductVariable>[] = [];
    const warnings: Diagnostic[] = [];

    for (const product of products) {
      const outcome = await this.source.fetchVariables(product);
      warnings.push(...outcome.warnings);
      if (!outcome.success) {
        warnings.push(outcome.error);
        continue;
      }
      sources.push({ product, records: outcome.data });
    }

    return { data: consolidateVariables(sources), warnings };
  }

  private pinProducts(
    products: readonly Product[],
    warnings: readonly Diagnostic[]
  ): SelectionResult<readonly Product[]> {
    this.state.pinProducts(products);
    this.cache.clearDerivedViews();

    const pinned = this.state.getProducts();
    log.info('Products set', {
      products: pinned.map((product) => ({ title: product.title, years: product.vintageYears })),
    });
    return succeed(pinned, warnings);
  }

  private pinGeographies(
    levels: readonly GeographyLevel[],
    warnings: readonly Diagnostic[]
  ): SelectionResult<GeographySelection> {
    this.state.pinGeographies(levels);

    const pinned = this.state.snapshot().geographies;
    log.info('Geographies set', { levels: pinned.map((level) => level.levelCode) });
    return succeed({ levels: pinned, parentRequirements: collectParentRequirements(pinned) }, warnings);
  }

  private pinVariables(
    variables: readonly Variable[],
    warnings: readonly Diagnostic[]
  ): SelectionResult<readonly Variable[]> {
    this.state.pinVariables(variables);

    const pinned = this.state.snapshot().variables;
    log.info('Variables set', { variables: pinned.map((variable) => variable.name) });
    return succeed(pinned, warnings);
  }

  /**
   * Pins always store a new array, so identity tells whether products were re-pinned
   */
  private productsChangedSince(products: readonly Product[]): boolean {
    return this.state.getProducts() !== products;
  }

  private selectionChangedDiagnostic(stage: string): Diagnostic {
    return errorDiagnostic(
      'SELECTION_CHANGED',
      `Products changed while ${stage} were loading; the result was discarded`,
      { stage }
    );
  }

  private noProductsDiagnostic(stage: string): Diagnostic {
    return errorDiagnostic('NO_PRODUCTS_SELECTED', `A product must be set before listing or setting ${stage}`);
  }

  private warn(
    code: Diagnostic['code'],
    message: string,
    details?: Readonly<Record<string, unknown>>
  ): Diagnostic {
    log.warn(message, details);
    return warningDiagnostic(code, message, details);
  }

  private reject(error: Diagnostic, warnings: readonly Diagnostic[] = []): Outcome<never> {
    log.error(error.message, { code: error.code, ...error.details });
    return fail(error, warnings);
  }

  private emptyListing(error: Diagnostic, warnings: readonly Diagnostic[] = []): Listing<never> {
    log.error(error.message, { code: error.code, ...error.details });
    return { items: [], diagnostics: [...warnings, error] };
  }
}
