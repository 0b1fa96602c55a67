/**
 * Polymarket Gamma API module
 *
 * Client, catalog fetcher, retry policy and catalog cache.
 */

export { GammaClient, createGammaClient, DEFAULT_CLIENT_CONFIG } from "./client";

export {
  CatalogFetcher,
  fetchCatalog,
  MAX_PAGE_SIZE,
  buildCatalogQuery,
  parseMarketRecord,
  parseMarketsPayload,
  parseOutcomePrices,
} from "./markets";
export type { CatalogFetcherOptions } from "./markets";

export {
  ErrorHandler,
  GammaErrorType,
  DEFAULT_RETRY_POLICY,
  RETRYABLE_ERROR_TYPES,
  calculateBackoffDelay,
  classifyError,
  classifyStatus,
  createErrorHandler,
  decideRetry,
  failureOutcome,
  parseRetryAfter,
} from "./error-handler";
export type {
  AttemptFailure,
  AttemptOutcome,
  ErrorHandlerConfig,
  ErrorHandlerResult,
  RetryDecision,
  RetryPolicy,
} from "./error-handler";

export { CatalogCache, CacheTTL, createCatalogCache } from "./cache";
export type { CatalogCacheConfig, CatalogCacheStats, CatalogResult } from "./cache";

export type {
  CatalogSnapshot,
  CatalogSource,
  FetchResult,
  GammaClientConfig,
  GammaMarketsResponse,
  GammaRequestOptions,
  MarketRecord,
} from "./types";
