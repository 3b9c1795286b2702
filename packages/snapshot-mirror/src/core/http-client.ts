/**
 * HTTP Client for snapshot listings
 *
 * Wraps the native fetch API with:
 * - Configurable timeouts via AbortController
 * - Error classification (status, timeout, network)
 * - A single attempt per request; callers see failures immediately
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 10000 });
 * const lines = await client.fetchLines('https://mran.microsoft.com/snapshot');
 * ```
 */

import { logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header (default: 'snapshot-mirror/1.0') */
  readonly userAgent: string;
}

/**
 * Per-request fetch options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx response
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
 * Network error (connection failed, DNS resolution, etc.)
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

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      timeoutMs: 30000,
      userAgent: 'snapshot-mirror/1.0',
      ...config,
    };
  }

  /**
   * Fetch a response body as text
   *
   * @throws {HTTPError} For HTTP error responses (4xx, 5xx)
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   */
  async fetchText(url: string, options?: FetchOptions): Promise<string> {
    const response = await this.fetchWithTimeout(url, options);

    if (!response.ok) {
      throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
    }

    return response.text();
  }

  /**
   * Fetch a response body split into lines
   */
  async fetchLines(url: string, options?: FetchOptions): Promise<string[]> {
    const text = await this.fetchText(url, options);
    const lines = text.split(/\r?\n/);
    // A trailing newline does not start another line
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  }

  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      logger.debug('HTTPClient request', { url, timeoutMs });

      return await fetch(url, {
        method: 'GET',
        headers: { 'User-Agent': this.config.userAgent },
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
}

// ============================================================================
// Convenience Functions
// ============================================================================

let defaultClient: HTTPClient | null = null;

/**
 * Get or create default HTTP client
 */
export function getHTTPClient(): HTTPClient {
  if (!defaultClient) {
    defaultClient = new HTTPClient();
  }
  return defaultClient;
}

export function createHTTPClient(config?: Partial<HTTPClientConfig>): HTTPClient {
  return new HTTPClient(config);
}
