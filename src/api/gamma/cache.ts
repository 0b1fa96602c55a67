/**
 * Catalog Cache for Polymarket Gamma API
 *
 * Holds the most recent catalog snapshot with a fixed TTL. Expired reads
 * trigger a refresh; concurrent readers share the one refresh in flight.
 * A failed refresh falls back to the previous snapshot when there is one.
 */

import type { CatalogSnapshot, CatalogSource } from "./types";
import { RemoteUnavailableError, type CatalogError } from "../../lib/errors";
import { serviceLoggers, type Logger } from "../../utils/logger";

/**
 * Configuration options for the cache
 */
export interface CatalogCacheConfig {
  /**
   * TTL (Time-To-Live) in milliseconds
   * @default 300000 (5 minutes)
   */
  ttl?: number;

  logger?: Logger;
}

/**
 * What a catalog read returns
 */
export type CatalogResult =
  | {
      success: true;
      snapshot: CatalogSnapshot;
      /** True when a refresh failed and an expired snapshot was served */
      stale: boolean;
    }
  | { success: false; error: CatalogError };

/**
 * Cache statistics
 */
export interface CatalogCacheStats {
  /** Reads served from a valid snapshot */
  hits: number;

  /** Reads that found the snapshot expired or absent */
  misses: number;

  /** Refreshes started (joined readers are not counted) */
  refreshes: number;

  refreshFailures: number;

  /** Reads answered with an expired snapshot after a failed refresh */
  staleServes: number;

  /** Age of the current snapshot in ms, null when empty */
  snapshotAge: number | null;

  /** Number of markets in the current snapshot */
  size: number;
}

/**
 * Predefined TTL values
 */
export const CacheTTL = {
  /** 1 minute */
  SHORT: 60000,

  /** 5 minutes - default */
  DEFAULT: 300000,

  /** 15 minutes */
  LONG: 900000,
} as const;

/**
 * Single-entry cache in front of a catalog source
 *
 * @example
 * ```typescript
 * const cache = new CatalogCache(new CatalogFetcher(), { ttl: CacheTTL.DEFAULT });
 * const result = await cache.getCatalog();
 * if (result.success) {
 *   console.log(result.snapshot.markets.length, result.stale);
 * }
 * ```
 */
export class CatalogCache {
  private readonly source: CatalogSource;
  private readonly ttl: number;
  private readonly logger: Logger;

  private snapshot: CatalogSnapshot | null = null;
  private invalidated = false;
  private inFlight: Promise<CatalogResult> | null = null;

  // Statistics
  private hits = 0;
  private misses = 0;
  private refreshes = 0;
  private refreshFailures = 0;
  private staleServes = 0;

  constructor(source: CatalogSource, config: CatalogCacheConfig = {}) {
    this.source = source;
    this.ttl = config.ttl ?? CacheTTL.DEFAULT;
    this.logger = config.logger ?? serviceLoggers.catalogCache;
  }

  private isFresh(snapshot: CatalogSnapshot): boolean {
    return !this.invalidated && Date.now() - snapshot.fetchedAt < this.ttl;
  }

  /**
   * Get the catalog, refreshing it first if it has expired
   */
  public async getCatalog(): Promise<CatalogResult> {
    const current = this.snapshot;
    if (current !== null && this.isFresh(current)) {
      this.hits++;
      return { success: true, snapshot: current, stale: false };
    }

    this.misses++;
    if (this.inFlight !== null) {
      this.logger.debug("Joining in-flight catalog refresh");
      return this.inFlight;
    }

    const refresh: Promise<CatalogResult> = this.refresh().finally(() => {
      if (this.inFlight === refresh) {
        this.inFlight = null;
      }
    });
    this.inFlight = refresh;
    return refresh;
  }

  /**
   * Run one refresh. The promise belongs to the cache, so a caller giving up
   * on it does not stop it from populating the snapshot for the others.
   * Never rejects.
   */
  private async refresh(): Promise<CatalogResult> {
    this.refreshes++;
    const previous = this.snapshot;

    let failure: CatalogError;
    try {
      const result = await this.source.fetch();
      if (result.success) {
        this.snapshot = result.data;
        this.invalidated = false;
        this.logger.debug("Catalog refreshed", { markets: result.data.markets.length });
        return { success: true, snapshot: result.data, stale: false };
      }
      failure = result.error;
    } catch (error) {
      failure = new RemoteUnavailableError(
        `Catalog refresh failed: ${error instanceof Error ? error.message : String(error)}`,
        { attempts: 1, cause: error }
      );
    }

    this.refreshFailures++;

    if (previous !== null) {
      this.staleServes++;
      this.logger.warn("Catalog refresh failed, serving stale snapshot", {
        error: failure.message,
        snapshotAge: Date.now() - previous.fetchedAt,
        markets: previous.markets.length,
      });
      return { success: true, snapshot: previous, stale: true };
    }

    this.logger.error("Catalog refresh failed with no snapshot to fall back on", {
      error: failure.message,
      kind: failure.kind,
    });
    return { success: false, error: failure };
  }

  /**
   * Current snapshot without triggering a refresh, expired or not
   */
  public peek(): CatalogSnapshot | null {
    return this.snapshot;
  }

  /**
   * Whether a refresh is running
   */
  public isRefreshing(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Mark the snapshot expired so the next read refreshes.
   * The snapshot itself is kept as the stale fallback.
   */
  public invalidate(): void {
    if (this.snapshot !== null) {
      this.invalidated = true;
      this.logger.info("Catalog invalidated");
    }
  }

  public getTTL(): number {
    return this.ttl;
  }

  public getStats(): CatalogCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      refreshes: this.refreshes,
      refreshFailures: this.refreshFailures,
      staleServes: this.staleServes,
      snapshotAge: this.snapshot === null ? null : Date.now() - this.snapshot.fetchedAt,
      size: this.snapshot?.markets.length ?? 0,
    };
  }

  public resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.refreshes = 0;
    this.refreshFailures = 0;
    this.staleServes = 0;
  }
}

export function createCatalogCache(source: CatalogSource, config: CatalogCacheConfig = {}): CatalogCache {
  return new CatalogCache(source, config);
}
