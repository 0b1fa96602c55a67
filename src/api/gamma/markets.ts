/**
 * Polymarket Gamma API - Markets Module
 *
 * Fetches the open-market catalog and parses it into fixed-shape records.
 */

import { GammaClient } from "./client";
import { ErrorHandler, GammaErrorType, type AttemptOutcome, type ErrorHandlerConfig } from "./error-handler";
import type {
  CatalogSnapshot,
  CatalogSource,
  FetchResult,
  GammaMarketsResponse,
  MarketRecord,
} from "./types";
import { MalformedResponseError, RemoteUnavailableError } from "../../lib/errors";
import { serviceLoggers, type Logger } from "../../utils/logger";

/**
 * Largest page the Gamma API serves for /markets
 */
export const MAX_PAGE_SIZE = 100;

export interface CatalogFetcherOptions {
  client?: GammaClient;

  /** Retry settings (maxAttempts, baseDelayMs, maxRetryAfterMs, sleep) */
  retry?: ErrorHandlerConfig;

  /** Requested page size, capped at MAX_PAGE_SIZE */
  pageSize?: number;

  logger?: Logger;

  /** Clock used to stamp snapshots */
  now?: () => number;
}

// ============================================================================
// Field parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return "";
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function asBoolean(value: unknown): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  return typeof value === "string" && value.toLowerCase() === "true";
}

function clampProbability(value: number | undefined): number {
  if (value === undefined) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Parse `outcomePrices`, which the API sends either as an array or as a
 * JSON-encoded string array like '["0.55", "0.45"]'
 */
export function parseOutcomePrices(value: unknown): readonly [number, number] {
  let list: unknown = value;
  if (typeof value === "string") {
    try {
      list = JSON.parse(value);
    } catch {
      list = [];
    }
  }

  if (!Array.isArray(list)) {
    return [0, 0];
  }

  return [clampProbability(asNumber(list[0])), clampProbability(asNumber(list[1]))];
}

/**
 * Turn one raw catalog entry into a MarketRecord
 *
 * Missing or mistyped fields are defaulted rather than rejected.
 *
 * @returns The frozen record, or null if the entry is not an object at all
 */
export function parseMarketRecord(raw: unknown): MarketRecord | null {
  if (!isRecord(raw)) {
    return null;
  }

  const question = asString(raw.question) || asString(raw.title);
  const volume = asNumber(raw.volume) ?? asNumber(raw.volumeNum) ?? 0;

  return Object.freeze({
    id: asString(raw.id),
    question,
    slug: asString(raw.slug),
    outcomePrices: Object.freeze(parseOutcomePrices(raw.outcomePrices)),
    volume: Math.max(0, volume),
    endDate: asString(raw.endDate),
    description: asString(raw.description),
    closed: asBoolean(raw.closed),
  });
}

function isMarketsResponse(body: Record<string, unknown>): body is Record<string, unknown> & GammaMarketsResponse {
  return Array.isArray(body.data);
}

/**
 * Extract the records from a /markets body
 *
 * Accepts a bare array or an object with a `data` array.
 *
 * @throws MalformedResponseError for any other shape
 */
export function parseMarketsPayload(body: unknown): MarketRecord[] {
  let entries: unknown[];

  if (Array.isArray(body)) {
    entries = body;
  } else if (isRecord(body) && isMarketsResponse(body)) {
    entries = body.data;
  } else {
    throw new MalformedResponseError(
      isRecord(body) ? "object without a data array" : `expected an array, got ${body === null ? "null" : typeof body}`
    );
  }

  const markets: MarketRecord[] = [];
  for (const entry of entries) {
    const record = parseMarketRecord(entry);
    if (record !== null) {
      markets.push(record);
    }
  }
  return markets;
}

/**
 * Build the /markets query string
 */
export function buildCatalogQuery(pageSize: number): string {
  const params = new URLSearchParams();
  params.set("closed", "false");
  params.set("limit", String(Math.min(Math.max(1, pageSize), MAX_PAGE_SIZE)));
  return params.toString();
}

// ============================================================================
// Fetcher
// ============================================================================

/**
 * Fetches the open-market catalog in a single request
 *
 * The Gamma API caps the page regardless of the requested limit; no
 * pagination is attempted.
 *
 * @example
 * ```typescript
 * const fetcher = new CatalogFetcher({ client: new GammaClient() });
 * const result = await fetcher.fetch();
 * if (result.success) {
 *   console.log(`${result.data.markets.length} markets`);
 * }
 * ```
 */
export class CatalogFetcher implements CatalogSource {
  private readonly client: GammaClient;
  private readonly handler: ErrorHandler;
  private readonly pageSize: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: CatalogFetcherOptions = {}) {
    this.client = options.client ?? new GammaClient();
    this.logger = options.logger ?? serviceLoggers.catalogFetcher;
    this.handler = new ErrorHandler({
      logger: this.logger,
      operation: "Fetch markets",
      ...options.retry,
    });
    this.pageSize = options.pageSize ?? MAX_PAGE_SIZE;
    this.now = options.now ?? Date.now;
  }

  private async attempt(): Promise<AttemptOutcome<MarketRecord[]>> {
    const outcome = await this.client.getJson(`/markets?${buildCatalogQuery(this.pageSize)}`);
    if (outcome.status !== "success") {
      return outcome;
    }

    try {
      return { status: "success", data: parseMarketsPayload(outcome.data) };
    } catch (error) {
      return {
        status: "terminal",
        failure: {
          errorType: GammaErrorType.PARSE,
          message: error instanceof Error ? error.message : String(error),
          cause: error,
        },
      };
    }
  }

  public async fetch(): Promise<FetchResult<CatalogSnapshot>> {
    this.logger.debug("Fetching market catalog", { baseUrl: this.client.getBaseUrl() });

    const result = await this.handler.execute(() => this.attempt());

    if (result.success) {
      const snapshot: CatalogSnapshot = Object.freeze({
        markets: Object.freeze(result.data),
        fetchedAt: this.now(),
      });
      this.logger.info("Fetched market catalog", {
        markets: snapshot.markets.length,
        attempts: result.attempts,
      });
      return { success: true, data: snapshot, attempts: result.attempts };
    }

    const { failure } = result;
    if (failure.errorType === GammaErrorType.PARSE) {
      return {
        success: false,
        error:
          failure.cause instanceof MalformedResponseError
            ? failure.cause
            : new MalformedResponseError(failure.message, { cause: failure.cause }),
        attempts: result.attempts,
      };
    }

    return {
      success: false,
      error: new RemoteUnavailableError(
        result.exhausted
          ? `Market catalog unavailable after ${result.attempts} attempt(s): ${failure.message}`
          : `Market catalog request rejected: ${failure.message}`,
        { attempts: result.attempts, statusCode: failure.statusCode, cause: failure.cause }
      ),
      attempts: result.attempts,
    };
  }
}

/**
 * Fetch the catalog once with a throwaway fetcher
 */
export async function fetchCatalog(options: CatalogFetcherOptions = {}): Promise<FetchResult<CatalogSnapshot>> {
  return new CatalogFetcher(options).fetch();
}
