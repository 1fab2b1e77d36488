import { describe, it, expect } from 'vitest';
import { DEFAULT_RESOLVER_CONFIG, getApiKeyFromEnv, loadConfigFromEnv } from '../../../core/config.js';

describe('loadConfigFromEnv', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual(DEFAULT_RESOLVER_CONFIG);
    expect(DEFAULT_RESOLVER_CONFIG.catalogUrl).toBe('https://api.census.gov/data.json');
  });

  it('applies valid overrides', () => {
    const config = loadConfigFromEnv({
      CENSUS_CATALOG_URL: 'http://localhost:8080/data.json',
      CENSUS_HTTP_TIMEOUT_MS: '2500',
      CENSUS_HTTP_MAX_RETRIES: '0',
    });

    expect(config).toEqual({
      catalogUrl: 'http://localhost:8080/data.json',
      apiHostPattern: 'api.census.gov/data',
      http: { timeoutMs: 2500, maxRetries: 0 },
    });
  });

  it('ignores invalid values and keeps the defaults', () => {
    const config = loadConfigFromEnv({
      CENSUS_CATALOG_URL: 'not a url',
      CENSUS_HTTP_TIMEOUT_MS: 'soon',
      CENSUS_HTTP_MAX_RETRIES: '11',
    });

    expect(config).toEqual(DEFAULT_RESOLVER_CONFIG);
  });

  it('treats blank values as unset', () => {
    expect(loadConfigFromEnv({ CENSUS_HTTP_TIMEOUT_MS: '   ' }).http.timeoutMs).toBe(10000);
  });
});

describe('getApiKeyFromEnv', () => {
  it('returns the trimmed key', () => {
    expect(getApiKeyFromEnv({ CENSUS_API_KEY: ' test-key ' })).toBe('test-key');
  });

  it('returns null when the key is missing or blank', () => {
    expect(getApiKeyFromEnv({})).toBeNull();
    expect(getApiKeyFromEnv({ CENSUS_API_KEY: '  ' })).toBeNull();
  });
});
