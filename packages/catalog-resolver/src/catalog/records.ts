/**
 * Catalog record mapping
 *
 * Converts validated upstream documents into typed records. Product records
 * are final; geography and variable records are per-product and still have to
 * go through the consolidator.
 */

import { RESERVED_VARIABLE_NAMES, type Product } from '../core/types/index.js';
import {
  CatalogEntrySchema,
  GeographyEntrySchema,
  VariableEntrySchema,
  type CatalogEntry,
} from './schemas.js';
import { parseVintage } from './vintage-parser.js';

/**
 * Geography level as exposed by a single product
 */
export interface ProductGeography {
  readonly levelCode: string;
  readonly description: string;
  readonly requiredParentLevels: readonly string[] | null;
}

/**
 * Variable as exposed by a single product
 */
export interface ProductVariable {
  readonly name: string;
  readonly label: string;
  readonly concept: string;
  readonly group: string;
}

export interface MappedRecords<R> {
  readonly records: R[];
  /** Entries that did not validate or lacked their natural key */
  readonly skipped: number;
}

const NOT_AVAILABLE = 'N/A';

// ============================================================================
// Products
// ============================================================================

/**
 * Map raw catalog entries to products
 *
 * Entries without a distribution URL on the API host are not retrievable and
 * are dropped silently; entries that fail validation count as skipped.
 */
export function toProducts(entries: readonly unknown[], apiHostPattern: string): MappedRecords<Product> {
  const records: Product[] = [];
  let skipped = 0;

  for (const raw of entries) {
    const parsed = CatalogEntrySchema.safeParse(raw);
    if (!parsed.success) {
      skipped++;
      continue;
    }

    const product = toProduct(parsed.data, apiHostPattern);
    if (product) {
      records.push(product);
    }
  }

  return { records, skipped };
}

export function toProduct(entry: CatalogEntry, apiHostPattern: string): Product | null {
  const accessURL = entry.distribution
    ?.map((dist) => dist.accessURL)
    .find((url): url is string => url !== undefined && url.includes(apiHostPattern));

  if (!accessURL) return null;

  const segments = entry.c_dataset ?? [];

  return Object.freeze({
    title: entry.title,
    description: entry.description ?? '',
    name: segments.join('/'),
    vintageYears: Object.freeze(parseVintage(entry.c_vintage)),
    datasetType: segments[1] ?? NOT_AVAILABLE,
    accessURL: accessURL.replace(/\/+$/, ''),
    isMicrodata: entry.c_isMicrodata,
    isAggregate: entry.c_isAggregate,
  });
}

// ============================================================================
// Geography levels
// ============================================================================

export function toGeographyRecords(entries: readonly unknown[]): MappedRecords<ProductGeography> {
  const records: ProductGeography[] = [];
  let skipped = 0;

  for (const raw of entries) {
    const parsed = GeographyEntrySchema.safeParse(raw);
    const levelCode = parsed.success
      ? parsed.data.geoLevelDisplay ?? parsed.data.geoLevelId
      : undefined;

    if (!parsed.success || !levelCode) {
      skipped++;
      continue;
    }

    const requires = parsed.data.requires;
    records.push({
      levelCode,
      description: parsed.data.name,
      requiredParentLevels: requires && requires.length > 0 ? requires : null,
    });
  }

  return { records, skipped };
}

// ============================================================================
// Variables
// ============================================================================

/**
 * Map a `variables` object to records, dropping the reserved query-parameter names
 */
export function toVariableRecords(
  variables: Readonly<Record<string, unknown>>
): MappedRecords<ProductVariable> {
  const records: ProductVariable[] = [];
  let skipped = 0;

  for (const [name, raw] of Object.entries(variables)) {
    if (RESERVED_VARIABLE_NAMES.has(name)) continue;

    const parsed = VariableEntrySchema.safeParse(raw);
    if (!parsed.success) {
      skipped++;
      continue;
    }

    records.push({
      name,
      label: parsed.data.label ?? '',
      concept: parsed.data.concept ?? '',
      group: parsed.data.group ?? NOT_AVAILABLE,
    });
  }

  return { records, skipped };
}
