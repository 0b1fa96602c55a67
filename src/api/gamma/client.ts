/**
 * Polymarket Gamma API Client
 *
 * HTTP client for the Polymarket Gamma API. Uses native fetch. A call makes
 * exactly one request and reports a typed outcome; retrying is left to
 * `ErrorHandler`.
 */

import type { GammaClientConfig, GammaRequestOptions } from "./types";
import {
  type AttemptOutcome,
  GammaErrorType,
  classifyError,
  classifyStatus,
  failureOutcome,
  parseRetryAfter,
} from "./error-handler";

/**
 * Default configuration for the Gamma API client
 */
export const DEFAULT_CLIENT_CONFIG: Required<GammaClientConfig> = {
  baseUrl: "https://gamma-api.polymarket.com",
  timeout: 30000, // 30 seconds
};

/**
 * Gamma API Client class
 *
 * @example
 * ```typescript
 * const client = new GammaClient({ timeout: 10000 });
 * const outcome = await client.getJson("/markets?closed=false");
 * ```
 */
export class GammaClient {
  private readonly config: Required<GammaClientConfig>;

  constructor(config: GammaClientConfig = {}) {
    this.config = {
      baseUrl: (config.baseUrl ?? DEFAULT_CLIENT_CONFIG.baseUrl).replace(/\/+$/, ""),
      timeout: config.timeout ?? DEFAULT_CLIENT_CONFIG.timeout,
    };
  }

  public getBaseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Get the configured timeout in milliseconds
   */
  public getTimeout(): number {
    return this.config.timeout;
  }

  private buildHeaders(customHeaders?: Record<string, string>): Record<string, string> {
    return {
      Accept: "application/json",
      ...customHeaders,
    };
  }

  /**
   * Issue one GET and parse the body as JSON
   *
   * @param endpoint - API endpoint (relative to base URL)
   * @param options - Request options
   */
  public async getJson(
    endpoint: string,
    options: GammaRequestOptions = {}
  ): Promise<AttemptOutcome<unknown>> {
    const timeout = options.timeout ?? this.config.timeout;
    const url = `${this.config.baseUrl}${endpoint}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeout);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: this.buildHeaders(options.headers),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      const errorType = classifyError(error);
      return failureOutcome({
        errorType,
        message:
          errorType === GammaErrorType.TIMEOUT
            ? `Request timeout after ${timeout}ms`
            : error instanceof Error
              ? error.message
              : String(error),
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      return failureOutcome({
        errorType: classifyStatus(response.status),
        message: `HTTP ${response.status}: ${response.statusText || text.slice(0, 200)}`,
        statusCode: response.status,
        retryAfterMs:
          response.status === 429 ? parseRetryAfter(response.headers.get("Retry-After")) : undefined,
      });
    }

    try {
      return { status: "success", data: JSON.parse(text) };
    } catch (error) {
      return {
        status: "terminal",
        failure: {
          errorType: GammaErrorType.PARSE,
          message: "Received invalid JSON data from market catalog",
          statusCode: response.status,
          cause: error,
        },
      };
    }
  }
}

/**
 * Create a new Gamma client with custom configuration
 */
export function createGammaClient(config: GammaClientConfig = {}): GammaClient {
  return new GammaClient(config);
}
