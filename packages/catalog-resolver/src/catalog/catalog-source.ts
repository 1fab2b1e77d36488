/**
 * Catalog Source
 *
 * Remote-fetch glue between the resolver and a CatalogTransport. Each method
 * fetches one document, validates its envelope, and maps its entries.
 *
 * ERROR POLICY: nothing thrown by the transport or the schemas escapes. A
 * failed fetch or an unusable document comes back as a failed Outcome carrying
 * a FETCH_FAILED / CATALOG_UNAVAILABLE diagnostic; skipped entries come back as
 * MALFORMED_RECORD warnings.
 */

import type { ZodType } from 'zod';
import type { ResolverConfig } from '../core/config.js';
import { CatalogDocumentError, describeError } from '../core/errors.js';
import { withApiKey, type CatalogTransport } from '../core/http-client.js';
import {
  errorDiagnostic,
  fail,
  succeed,
  warningDiagnostic,
  type Diagnostic,
  type DiagnosticCode,
  type Outcome,
  type Product,
} from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import {
  toGeographyRecords,
  toProducts,
  toVariableRecords,
  type MappedRecords,
  type ProductGeography,
  type ProductVariable,
} from './records.js';
import {
  CatalogDocumentSchema,
  GeographyDocumentSchema,
  VariablesDocumentSchema,
  summarizeIssues,
} from './schemas.js';

const log = createLogger({ module: 'catalog-source' });

export class CatalogSource {
  constructor(
    private readonly transport: CatalogTransport,
    private readonly config: Pick<ResolverConfig, 'catalogUrl' | 'apiHostPattern'>,
    private readonly apiKey: () => string | null
  ) {}

  /**
   * Fetch and map the full product catalog
   */
  async fetchProducts(): Promise<Outcome<readonly Product[]>> {
    const url = this.config.catalogUrl;
    const document = await this.fetchDocument(url, CatalogDocumentSchema, 'CATALOG_UNAVAILABLE');
    if (!document.success) return document;

    const mapped = toProducts(document.data.dataset, this.config.apiHostPattern);
    log.info('Catalog loaded', {
      entries: document.data.dataset.length,
      products: mapped.records.length,
      skipped: mapped.skipped,
    });

    return succeed(Object.freeze(mapped.records), skippedWarnings(mapped, url));
  }

  /**
   * Fetch one product's geography levels
   */
  async fetchGeographies(product: Product): Promise<Outcome<readonly ProductGeography[]>> {
    const url = `${product.accessURL}/geography.json`;
    const document = await this.fetchDocument(url, GeographyDocumentSchema, 'FETCH_FAILED', product);
    if (!document.success) return document;

    const mapped = toGeographyRecords(document.data.fips);
    return succeed(mapped.records, skippedWarnings(mapped, url));
  }

  /**
   * Fetch one product's variables (reserved names already removed)
   */
  async fetchVariables(product: Product): Promise<Outcome<readonly ProductVariable[]>> {
    const url = `${product.accessURL}/variables.json`;
    const document = await this.fetchDocument(url, VariablesDocumentSchema, 'FETCH_FAILED', product);
    if (!document.success) return document;

    const mapped = toVariableRecords(document.data.variables);
    return succeed(mapped.records, skippedWarnings(mapped, url));
  }

  private async fetchDocument<T>(
    url: string,
    schema: ZodType<T>,
    failureCode: DiagnosticCode,
    product?: Product
  ): Promise<Outcome<T>> {
    const context = product ? { url, product: product.title } : { url };

    try {
      const body = await this.transport.fetchJSON(withApiKey(url, this.apiKey()));
      const parsed = schema.safeParse(body);

      if (!parsed.success) {
        throw new CatalogDocumentError(
          `Unexpected document shape from ${url}`,
          url,
          summarizeIssues(parsed.error)
        );
      }

      return succeed(parsed.data);
    } catch (error) {
      const message = describeError(error);
      const details = error instanceof CatalogDocumentError ? { ...context, issues: error.issues } : context;
      const summary = `Could not load ${url}: ${message}`;

      if (failureCode === 'CATALOG_UNAVAILABLE') {
        log.error('Catalog document fetch failed', { ...details, error: message });
        return fail(errorDiagnostic(failureCode, summary, details));
      }

      log.warn('Catalog document fetch failed', { ...details, error: message });
      const diagnostic = warningDiagnostic(failureCode, summary, details);
      return fail(diagnostic);
    }
  }
}

function skippedWarnings<R>(mapped: MappedRecords<R>, url: string): Diagnostic[] {
  if (mapped.skipped === 0) return [];
  log.warn('Skipped malformed catalog entries', { url, skipped: mapped.skipped });
  return [
    warningDiagnostic('MALFORMED_RECORD', `Skipped ${mapped.skipped} malformed entries from ${url}`, {
      url,
      skipped: mapped.skipped,
    }),
  ];
}
