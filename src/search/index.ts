/**
 * Market search module
 */

export { normalizeQuery, normalizeText, DEFAULT_MIN_QUERY_LENGTH } from "./normalizer";
export type { NormalizeResult } from "./normalizer";

export { matchMarkets, tokenSetScore, ratio, DEFAULT_MATCH_OPTIONS } from "./matcher";

export { classifyMatches, DEFAULT_CLASSIFY_OPTIONS } from "./classifier";

export {
  MarketSearch,
  createMarketSearch,
  createCatalogCacheFromConfig,
  resolveSearchConfig,
} from "./pipeline";
export type { MarketSearchDeps } from "./pipeline";

export { DEFAULT_SEARCH_CONFIG } from "./types";
export type {
  ClassifiedKind,
  ClassifiedResult,
  ClassifyOptions,
  MatchCandidate,
  MatchOptions,
  SearchConfig,
  SearchResult,
} from "./types";
