/**
 * HTTP Client for Authority Sync
 *
 * Every collaborator (activity feed, record fetch, knowledge-base read and
 * write) goes through this client:
 * - Exponential backoff with jitter
 * - Timeouts via AbortController
 * - Error classification (retryable vs. terminal)
 * - Bot user agent on every request
 *
 * Native fetch; no transport dependency.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 2, timeoutMs: 20000 });
 * const page = await client.fetchJSON('https://id.loc.gov/authorities/names/activitystreams/feed/1.json');
 * const xml = await client.fetchText('https://id.loc.gov/authorities/names/no2022065764.marcxml.xml');
 * ```
 */

import { logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts (default: 3) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 30000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  readonly userAgent: string;

  /** Jitter factor (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

/**
 * Per-request options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
  readonly method?: 'GET' | 'POST' | 'HEAD';
  readonly body?: string | URLSearchParams;
}

export const DEFAULT_USER_AGENT = 'AuthoritySyncBot/1.0 (name-authority reconciliation)';

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-success HTTP status
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
 * Connection failed, DNS resolution, etc.
 */
export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

export class HTTPRetryExhaustedError extends Error {
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, lastError: Error) {
    super(`Retry exhausted after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.name = 'HTTPRetryExhaustedError';
    this.url = url;
    this.attempts = attempts;
  }
}

export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`, { cause });
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 3,
      initialDelayMs: 1000,
      backoffMultiplier: 2,
      maxDelayMs: 30000,
      timeoutMs: 30000,
      userAgent: DEFAULT_USER_AGENT,
      jitterFactor: 0.1,
      ...config,
    };
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {HTTPError} For HTTP error responses (4xx, 5xx)
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   * @throws {HTTPJSONParseError} If response is not valid JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const text = await this.fetchText(url, options);

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Fetch a response body as text
   */
  async fetchText(url: string, options?: FetchOptions): Promise<string> {
    const response = await this.fetchWithRetry(url, options);
    return response.text();
  }

  /**
   * Fetch raw response with retry logic
   *
   * Terminal failures (4xx other than 408/429, parse errors) are thrown as
   * they are, without retry. A retryable failure on the last attempt becomes
   * HTTPRetryExhaustedError, unless retries were disabled (`retries: 0`), in
   * which case the single attempt's error is thrown as is.
   */
  async fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
    const maxRetries = options?.retries ?? this.config.maxRetries;
    const maxAttempts = maxRetries + 1;
    let lastError: Error = new Error('No attempt made');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const response = await this.fetchWithTimeout(url, options);

        if (response.ok) {
          return response;
        }

        throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.isRetryableError(lastError) || maxRetries === 0) {
          throw lastError;
        }

        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts,
          error: lastError.message,
          url,
        });
      }

      if (attempt < maxAttempts) {
        await this.sleep(this.calculateBackoffDelay(attempt));
      }
    }

    throw new HTTPRetryExhaustedError(url, maxAttempts, lastError);
  }

  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        method: options?.method ?? 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        body: options?.body,
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }

      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // Jitter range: [delay * (1 - jitterFactor), delay * (1 + jitterFactor)]
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableStatus(status: number): boolean {
    return (
      status === 408 ||
      status === 429 ||
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

    // Parse errors and unknown errors fail fast
    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Create HTTP client with custom config
 */
export function createHTTPClient(config?: Partial<HTTPClientConfig>): HTTPClient {
  return new HTTPClient(config);
}
