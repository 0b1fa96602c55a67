/**
 * Market Search Pipeline
 *
 * normalize → cached catalog → match → classify. Failures come back as
 * values; nothing here throws for bad input or an unreachable source.
 */

import { CatalogCache } from "../api/gamma/cache";
import { GammaClient } from "../api/gamma/client";
import type { ErrorHandlerConfig } from "../api/gamma/error-handler";
import { CatalogFetcher } from "../api/gamma/markets";
import type { CatalogSource } from "../api/gamma/types";
import { serviceLoggers, type Logger } from "../utils/logger";
import { classifyMatches } from "./classifier";
import { matchMarkets } from "./matcher";
import { normalizeQuery } from "./normalizer";
import { DEFAULT_SEARCH_CONFIG, type SearchConfig, type SearchResult } from "./types";

/**
 * Collaborators that can be swapped out, mostly for tests
 */
export interface MarketSearchDeps {
  /** Use this cache instead of building one */
  cache?: CatalogCache;

  /** Source for a newly built cache, instead of the Gamma fetcher */
  source?: CatalogSource;

  /** Retry overrides for a newly built fetcher (e.g. `sleep`) */
  retry?: Omit<ErrorHandlerConfig, "maxAttempts">;

  logger?: Logger;
}

/**
 * Fill in defaults for any missing configuration values
 */
export function resolveSearchConfig(config: Partial<SearchConfig> = {}): SearchConfig {
  return { ...DEFAULT_SEARCH_CONFIG, ...config };
}

/**
 * Build the cache and fetcher a config describes
 */
export function createCatalogCacheFromConfig(
  config: SearchConfig,
  deps: Pick<MarketSearchDeps, "source" | "retry"> = {}
): CatalogCache {
  const source =
    deps.source ??
    new CatalogFetcher({
      client: new GammaClient({
        baseUrl: config.baseUrl,
        timeout: config.requestTimeoutSeconds * 1000,
      }),
      retry: { ...deps.retry, maxAttempts: config.retryAttempts },
      pageSize: config.pageSize,
    });

  return new CatalogCache(source, { ttl: config.cacheTtlSeconds * 1000 });
}

/**
 * Finds the markets that best match free-text queries
 *
 * One instance owns one catalog cache; share the instance across
 * concurrent callers so they share the cache.
 *
 * @example
 * ```typescript
 * const search = createMarketSearch({ cacheTtlSeconds: 120 });
 * const outcome = await search.search("bitcoin 200k 2027");
 * if (outcome.success && outcome.result.kind === "single") {
 *   console.log(outcome.result.candidate.market.question);
 * }
 * ```
 */
export class MarketSearch {
  private readonly config: SearchConfig;
  private readonly cache: CatalogCache;
  private readonly logger: Logger;

  constructor(config: Partial<SearchConfig> = {}, deps: MarketSearchDeps = {}) {
    this.config = resolveSearchConfig(config);
    this.cache = deps.cache ?? createCatalogCacheFromConfig(this.config, deps);
    this.logger = deps.logger ?? serviceLoggers.marketSearch;
  }

  public getConfig(): SearchConfig {
    return { ...this.config };
  }

  public getCache(): CatalogCache {
    return this.cache;
  }

  public async search(rawQuery: string): Promise<SearchResult> {
    const normalized = normalizeQuery(rawQuery, this.config.minQueryLength);
    if (!normalized.success) {
      this.logger.debug("Rejected query", {
        reason: normalized.error.reason,
        normalized: normalized.error.normalized,
      });
      return { success: false, error: normalized.error };
    }

    const { query } = normalized;
    const catalog = await this.cache.getCatalog();
    if (!catalog.success) {
      this.logger.warn("Search failed, catalog unavailable", {
        query,
        kind: catalog.error.kind,
        error: catalog.error.message,
      });
      return { success: false, error: catalog.error };
    }

    const candidates = matchMarkets(query, catalog.snapshot, this.config);
    const result = classifyMatches(candidates, query, this.config);

    this.logger.info("Search completed", {
      query,
      kind: result.kind,
      candidates: candidates.length,
      topScore: candidates[0]?.score ?? null,
      catalogSize: catalog.snapshot.markets.length,
      stale: catalog.stale,
    });

    return {
      success: true,
      result,
      catalogSize: catalog.snapshot.markets.length,
      stale: catalog.stale,
    };
  }
}

export function createMarketSearch(
  config: Partial<SearchConfig> = {},
  deps: MarketSearchDeps = {}
): MarketSearch {
  return new MarketSearch(config, deps);
}
