/**
 * Catalog Resolver Configuration
 *
 * Typed, immutable defaults for catalog endpoints and transport behavior,
 * plus environment overrides read at runtime.
 *
 * Environment variables:
 * - CENSUS_API_KEY (optional; attached as `key` query parameter)
 * - CENSUS_CATALOG_URL
 * - CENSUS_HTTP_TIMEOUT_MS
 * - CENSUS_HTTP_MAX_RETRIES
 */

import { z } from 'zod';
import { DEFAULT_HTTP_CLIENT_CONFIG, type HTTPClientConfig } from './http-client.js';
import { createLogger } from './utils/logger.js';

const log = createLogger({ module: 'config' });

export interface ResolverConfig {
  /** Top-level catalog document listing every product */
  readonly catalogUrl: string;

  /**
   * Substring a distribution URL must contain to count as the product's API
   * endpoint. Entries without such a URL are not retrievable and are dropped.
   */
  readonly apiHostPattern: string;

  /** Transport settings for the default HTTP client */
  readonly http: Readonly<Partial<HTTPClientConfig>>;
}

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  catalogUrl: 'https://api.census.gov/data.json',
  apiHostPattern: 'api.census.gov/data',
  http: {
    timeoutMs: DEFAULT_HTTP_CLIENT_CONFIG.timeoutMs,
    maxRetries: DEFAULT_HTTP_CLIENT_CONFIG.maxRetries,
  },
};

type Env = Readonly<Record<string, string | undefined>>;

const CatalogUrlSchema = z.string().url();
const TimeoutSchema = z.coerce.number().int().positive();
const MaxRetriesSchema = z.coerce.number().int().min(0).max(10);

/**
 * Build configuration from environment variables
 *
 * Each variable is validated on its own; an invalid value is ignored with a
 * warning and the default stays in place.
 */
export function loadConfigFromEnv(env: Env = process.env): ResolverConfig {
  const catalogUrl = readEnvValue(env, 'CENSUS_CATALOG_URL', CatalogUrlSchema);
  const timeoutMs = readEnvValue(env, 'CENSUS_HTTP_TIMEOUT_MS', TimeoutSchema);
  const maxRetries = readEnvValue(env, 'CENSUS_HTTP_MAX_RETRIES', MaxRetriesSchema);

  return {
    ...DEFAULT_RESOLVER_CONFIG,
    catalogUrl: catalogUrl ?? DEFAULT_RESOLVER_CONFIG.catalogUrl,
    http: {
      ...DEFAULT_RESOLVER_CONFIG.http,
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      ...(maxRetries !== undefined ? { maxRetries } : {}),
    },
  };
}

/**
 * Read the optional API key. Blank values count as absent.
 */
export function getApiKeyFromEnv(env: Env = process.env): string | null {
  const key = env.CENSUS_API_KEY?.trim();
  return key ? key : null;
}

function readEnvValue<T>(env: Env, name: string, schema: z.ZodType<T>): T | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const result = schema.safeParse(raw.trim());
  if (!result.success) {
    log.warn('Ignoring invalid environment value', {
      variable: name,
      reason: result.error.errors[0]?.message ?? 'invalid value',
    });
    return undefined;
  }

  return result.data;
}
