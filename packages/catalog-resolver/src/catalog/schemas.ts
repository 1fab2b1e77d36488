/**
 * Catalog Document Schemas
 *
 * Zod schemas for the three upstream JSON documents. Envelopes are validated
 * strictly (a document without its top-level collection is unusable); entries
 * are validated one by one so a single odd record is skipped, not fatal.
 */

import { z } from 'zod';

// ============================================================================
// Product catalog (data.json)
// ============================================================================

export const CatalogDocumentSchema = z.object({
  dataset: z.array(z.unknown()),
});

const FlagSchema = z.unknown().transform((value) => value === true);

export const CatalogEntrySchema = z.object({
  title: z.string().min(1),
  description: z.string().optional(),
  c_vintage: z.unknown().optional(),
  c_dataset: z.array(z.string()).optional(),
  c_isMicrodata: FlagSchema,
  c_isAggregate: FlagSchema,
  distribution: z
    .array(
      z.object({
        accessURL: z.string().optional(),
      })
    )
    .optional(),
});

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

// ============================================================================
// Geography levels ({accessURL}/geography.json)
// ============================================================================

export const GeographyDocumentSchema = z.object({
  fips: z.array(z.unknown()),
});

export const GeographyEntrySchema = z.object({
  name: z.string(),
  geoLevelDisplay: z.string().optional(),
  geoLevelId: z.string().optional(),
  referenceDate: z.string().optional(),
  requires: z.array(z.string()).optional(),
});

export type GeographyEntry = z.infer<typeof GeographyEntrySchema>;

// ============================================================================
// Variables ({accessURL}/variables.json)
// ============================================================================

export const VariablesDocumentSchema = z.object({
  variables: z.record(z.unknown()),
});

export const VariableEntrySchema = z.object({
  label: z.string().optional(),
  concept: z.string().optional(),
  group: z.string().optional(),
});

export type VariableEntry = z.infer<typeof VariableEntrySchema>;

/**
 * First few schema issues, formatted for logs and diagnostics
 */
export function summarizeIssues(error: z.ZodError, limit = 3): string[] {
  return error.errors
    .slice(0, limit)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
