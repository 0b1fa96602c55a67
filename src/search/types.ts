/**
 * Type definitions for market search
 */

import type { MarketRecord } from "../api/gamma/types";
import type { SearchError } from "../lib/errors";

/**
 * A market paired with its similarity to the query (0-100)
 */
export interface MatchCandidate {
  readonly market: MarketRecord;
  readonly score: number;
}

/**
 * How a search resolved
 */
export type ClassifiedResult =
  | { kind: "single"; candidate: MatchCandidate }
  | { kind: "multiple"; candidates: readonly MatchCandidate[] }
  | { kind: "none"; query: string };

export type ClassifiedKind = ClassifiedResult["kind"];

/**
 * Thresholds shared by the matcher and the classifier
 */
export interface MatchOptions {
  /** Minimum score for a candidate to count at all */
  scoreCutoff: number;

  /** Most candidates returned */
  maxCandidates: number;
}

export interface ClassifyOptions extends MatchOptions {
  /** Score above which a top candidate is trusted on its own */
  highConfidenceThreshold: number;

  /** A runner-up within this many points of the top makes it ambiguous */
  ambiguityMargin: number;
}

/**
 * Everything `search` can be configured with
 */
export interface SearchConfig extends ClassifyOptions {
  baseUrl: string;
  cacheTtlSeconds: number;
  requestTimeoutSeconds: number;

  /** Total attempts per catalog fetch */
  retryAttempts: number;

  /** Requested /markets page size */
  pageSize: number;

  minQueryLength: number;
}

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  baseUrl: "https://gamma-api.polymarket.com",
  cacheTtlSeconds: 300,
  requestTimeoutSeconds: 30,
  retryAttempts: 3,
  pageSize: 100,
  scoreCutoff: 60,
  highConfidenceThreshold: 85,
  maxCandidates: 5,
  minQueryLength: 3,
  ambiguityMargin: 1,
};

/**
 * What `search` returns
 */
export type SearchResult =
  | {
      success: true;
      result: ClassifiedResult;

      /** Number of markets the query was scored against */
      catalogSize: number;

      /** True when the catalog was served stale after a failed refresh */
      stale: boolean;
    }
  | { success: false; error: SearchError };
