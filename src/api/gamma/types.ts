/**
 * Type definitions for the Polymarket Gamma API catalog
 */

import type { CatalogError } from "../../lib/errors";

/**
 * Paginated response wrapper some Gamma endpoints use
 */
export interface GammaMarketsResponse {
  data: unknown[];
  count?: number;
  limit?: number;
  offset?: number;
}

/**
 * Immutable snapshot of one catalog entry
 *
 * The Gamma API is loosely typed (numbers may arrive as strings and
 * `outcomePrices` is usually a JSON-encoded string array); records are
 * normalized once by `parseMarketRecord`.
 */
export interface MarketRecord {
  readonly id: string;
  readonly question: string;
  readonly slug: string;

  /** Yes/No prices, each in [0, 1] */
  readonly outcomePrices: readonly [number, number];

  /** Traded volume in USD, never negative */
  readonly volume: number;

  /** Close timestamp as sent by the API, "" when missing */
  readonly endDate: string;

  readonly description: string;
  readonly closed: boolean;
}

/**
 * The full catalog captured at one point in time
 */
export interface CatalogSnapshot {
  readonly markets: readonly MarketRecord[];

  /** Epoch milliseconds when the fetch completed */
  readonly fetchedAt: number;
}

/**
 * Outcome of a catalog fetch
 */
export type FetchResult<T> =
  | { success: true; data: T; attempts: number }
  | { success: false; error: CatalogError; attempts: number };

/**
 * Anything that can produce a catalog snapshot
 */
export interface CatalogSource {
  fetch(): Promise<FetchResult<CatalogSnapshot>>;
}

/**
 * Client configuration options
 */
export interface GammaClientConfig {
  baseUrl?: string;

  /** Per-request timeout in milliseconds */
  timeout?: number;
}

/**
 * Request options for API calls
 */
export interface GammaRequestOptions {
  headers?: Record<string, string>;
  timeout?: number;
}
