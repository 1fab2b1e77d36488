/**
 * Census Catalog Resolver
 *
 * @census-catalog/resolver provides:
 * - A process-lifetime cache of the Census API product catalog
 * - Regex filtering of products, geography levels and variables (AND / OR)
 * - Consolidation of geography/variable metadata across products and vintages
 * - A pinned selection (years → products → geographies / variables) for the
 *   bulk-fetch stage
 *
 * @packageDocumentation
 */

// Resolver
export {
  CensusCatalogResolver,
  type CatalogResolverOptions,
  type ListOptions,
  type ProductListOptions,
  type GeographyMatchField,
  type GeographySelection,
  type ResolvedSelection,
} from './services/catalog-resolver.js';

// Selection state
export {
  SelectionState,
  groupVariablesByProduct,
  collectParentRequirements,
  type SelectionSnapshot,
  type ProductVariableGroup,
} from './services/selection-state.js';

// Catalog building blocks
export { parseVintage } from './catalog/vintage-parser.js';
export { parseYearSet, intersects, type YearSetParseResult } from './catalog/year-set.js';
export {
  applyMatcher,
  createMatcher,
  type PatternInput,
  type TextMatcher,
} from './catalog/pattern-filter.js';
export {
  consolidateGeographies,
  consolidateVariables,
  type ProductRecords,
} from './catalog/consolidator.js';
export { CatalogCache, type CatalogLoader } from './catalog/catalog-cache.js';
export { CatalogSource } from './catalog/catalog-source.js';
export type { ProductGeography, ProductVariable } from './catalog/records.js';

// Types
export * from './core/types/index.js';

// Transport, configuration, errors
export {
  HTTPClient,
  HTTPError,
  HTTPTimeoutError,
  HTTPNetworkError,
  HTTPJSONParseError,
  withApiKey,
  type CatalogTransport,
  type HTTPClientConfig,
} from './core/http-client.js';
export {
  DEFAULT_RESOLVER_CONFIG,
  loadConfigFromEnv,
  getApiKeyFromEnv,
  type ResolverConfig,
} from './core/config.js';
export {
  CatalogDocumentError,
  InvalidPatternError,
  SelectionInvariantError,
} from './core/errors.js';
export { logger, createLogger, type LogLevel, type LogMetadata } from './core/utils/logger.js';
