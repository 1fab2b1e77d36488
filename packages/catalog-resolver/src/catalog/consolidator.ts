/**
 * Consolidator
 *
 * Merges per-product geography and variable records that share a natural key
 * (level code, variable name) into one record with multi-product provenance.
 *
 * MERGE RULES:
 * - First occurrence wins for descriptive fields (description, label, concept, group)
 * - Every product exposing the key appends one `appliesTo` entry, in input order
 * - A product listing the same key twice contributes a single entry
 * - Geography parent requirements are the union across products (first-seen order),
 *   or null when no product declares any
 *
 * Output records and their arrays are frozen.
 */

import type { AppliesTo, GeographyLevel, Product, Variable } from '../core/types/index.js';
import type { ProductGeography, ProductVariable } from './records.js';

export interface ProductRecords<R> {
  readonly product: Product;
  readonly records: readonly R[];
}

interface Accumulator<R> {
  readonly first: R;
  readonly appliesTo: AppliesTo[];
  readonly seenProducts: Set<string>;
  readonly extra: R[];
}

function accumulate<R>(
  sources: readonly ProductRecords<R>[],
  keyOf: (record: R) => string
): Map<string, Accumulator<R>> {
  const merged = new Map<string, Accumulator<R>>();

  for (const { product, records } of sources) {
    for (const record of records) {
      const key = keyOf(record);
      let entry = merged.get(key);

      if (!entry) {
        entry = { first: record, appliesTo: [], seenProducts: new Set(), extra: [] };
        merged.set(key, entry);
      } else {
        entry.extra.push(record);
      }

      // accessURL identifies a product; titles repeat across vintages
      if (!entry.seenProducts.has(product.accessURL)) {
        entry.seenProducts.add(product.accessURL);
        entry.appliesTo.push(
          Object.freeze({ product: product.title, years: Object.freeze([...product.vintageYears]) })
        );
      }
    }
  }

  return merged;
}

export function consolidateGeographies(
  sources: readonly ProductRecords<ProductGeography>[]
): GeographyLevel[] {
  const merged = accumulate(sources, (record) => record.levelCode);

  return [...merged.values()].map(({ first, appliesTo, extra }) => {
    const requires = unionRequirements([first, ...extra]);
    return Object.freeze({
      levelCode: first.levelCode,
      description: first.description,
      appliesTo: Object.freeze(appliesTo),
      requiredParentLevels: requires ? Object.freeze(requires) : null,
    });
  });
}

export function consolidateVariables(
  sources: readonly ProductRecords<ProductVariable>[]
): Variable[] {
  const merged = accumulate(sources, (record) => record.name);

  return [...merged.values()].map(({ first, appliesTo }) =>
    Object.freeze({
      name: first.name,
      label: first.label,
      concept: first.concept,
      group: first.group,
      appliesTo: Object.freeze(appliesTo),
    })
  );
}

function unionRequirements(records: readonly ProductGeography[]): string[] | null {
  let union: string[] | null = null;

  for (const record of records) {
    if (record.requiredParentLevels === null) continue;
    const levels: string[] = union ?? [];
    for (const level of record.requiredParentLevels) {
      if (!levels.includes(level)) levels.push(level);
    }
    union = levels;
  }

  return union;
}
