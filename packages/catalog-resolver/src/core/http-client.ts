/**
 * HTTP Client for catalog documents
 *
 * Every remote read the resolver makes goes through a `CatalogTransport`.
 * The default implementation wraps native fetch with:
 * - Per-request timeout via AbortController
 * - Exponential backoff with jitter on retryable failures
 * - Typed errors for HTTP status, timeout, network and JSON parse failures
 *
 * The resolver treats any rejection from a transport as "no data for this item";
 * retry policy lives here so callers never see it.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 10000, maxRetries: 2 });
 * const doc = await client.fetchJSON(withApiKey('https://api.census.gov/data.json', key));
 * ```
 */

import { logger } from './utils/logger.js';

// ============================================================================
// Transport Contract
// ============================================================================

/**
 * Read-only JSON document source
 */
export interface CatalogTransport {
  fetchJSON(url: string): Promise<unknown>;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts (default: 2) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 500) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 8000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 10000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** Jitter factor to prevent thundering herd (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

export const DEFAULT_HTTP_CLIENT_CONFIG: HTTPClientConfig = {
  maxRetries: 2,
  initialDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 8000,
  timeoutMs: 10000,
  userAgent: 'census-catalog/0.1',
  jitterFactor: 0.1,
};

// ============================================================================
// Error Types
// ============================================================================

/**
 * HTTP error response (4xx, 5xx)
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

/**
 * Request timeout error (AbortController triggered)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Network error (connection refused, DNS resolution, etc.)
 */
export class HTTPNetworkError extends Error {
  readonly url: string;
  override readonly cause: Error;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`);
    this.name = 'HTTPNetworkError';
    this.url = url;
    this.cause = cause;
  }
}

/**
 * Response body was not valid JSON
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;
  override readonly cause: Error;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`);
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
    this.cause = cause;
  }
}

// ============================================================================
// API Key Handling
// ============================================================================

/**
 * Attach the API key as the `key` query parameter, when one is present
 */
export function withApiKey(url: string, apiKey: string | null): string {
  if (!apiKey) return url;
  const parsed = new URL(url);
  parsed.searchParams.set('key', apiKey);
  return parsed.toString();
}

/**
 * Strip the `key` query parameter so a URL can be logged
 */
export function redactApiKey(url: string): string {
  try {
    const parsed = new URL(url);
    if (!parsed.searchParams.has('key')) return url;
    parsed.searchParams.delete('key');
    return parsed.toString();
  } catch {
    return url;
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient implements CatalogTransport {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      ...DEFAULT_HTTP_CLIENT_CONFIG,
      ...config,
    };
  }

  /**
   * Fetch and parse a JSON document
   *
   * @throws {HTTPError} For non-retryable or final HTTP error responses
   * @throws {HTTPTimeoutError} If the final attempt exceeds the timeout
   * @throws {HTTPNetworkError} For network failures on the final attempt
   * @throws {HTTPJSONParseError} If the body is not valid JSON
   */
  async fetchJSON(url: string): Promise<unknown> {
    const response = await this.fetchWithRetry(url);
    const text = await response.text();

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(
        redactApiKey(url),
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Fetch raw response, retrying retryable failures with backoff
   */
  async fetchWithRetry(url: string): Promise<Response> {
    const maxAttempts = this.config.maxRetries + 1;
    const safeUrl = redactApiKey(url);

    for (let attempt = 1; ; attempt++) {
      const isLastAttempt = attempt >= maxAttempts;

      try {
        const response = await this.fetchWithTimeout(url);

        if (response.ok) {
          return response;
        }

        throw new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          safeUrl
        );
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));

        if (!this.isRetryableError(failure) || isLastAttempt) {
          throw failure;
        }

        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts,
          error: failure.message,
          url: safeUrl,
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }
  }

  private async fetchWithTimeout(url: string): Promise<Response> {
    const timeoutMs = this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
        },
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(redactApiKey(url), timeoutMs);
      }

      throw new HTTPNetworkError(
        redactApiKey(url),
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Exponential backoff: initialDelay * multiplier^(attempt - 1), capped, ± jitter
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableStatus(status: number): boolean {
    return (
      status === 408 || // Request Timeout
      status === 429 || // Too Many Requests
      status === 500 ||
      status === 502 ||
      status === 503 ||
      status === 504
    );
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }

    if (error instanceof HTTPError) {
      return this.isRetryableStatus(error.statusCode);
    }

    // Parse errors and unknown errors are deterministic: fail fast
    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
