/**
 * Search Error Types
 *
 * Every failure the discovery pipeline can report is one of these classes.
 * They are returned as values from the pipeline, never thrown past `search`.
 */

/**
 * Top-level failure kinds surfaced to the command layer
 */
export enum SearchErrorKind {
  /** Query rejected before any network access */
  VALIDATION = "VALIDATION",

  /** Retries exhausted, or the source refused the request */
  REMOTE_UNAVAILABLE = "REMOTE_UNAVAILABLE",

  /** The source answered with a body outside the expected schema */
  MALFORMED_RESPONSE = "MALFORMED_RESPONSE",
}

/**
 * Why a query failed validation
 */
export enum ValidationReason {
  EMPTY = "EMPTY",
  TOO_SHORT = "TOO_SHORT",
}

/**
 * Base class for all pipeline errors
 */
export abstract class MarketSearchError extends Error {
  public abstract readonly kind: SearchErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class QueryValidationError extends MarketSearchError {
  public readonly kind = SearchErrorKind.VALIDATION;
  public readonly reason: ValidationReason;

  /** Normalized text that failed validation ("" for EMPTY) */
  public readonly normalized: string;

  public readonly minLength: number;

  constructor(reason: ValidationReason, normalized: string, minLength: number) {
    super(
      reason === ValidationReason.EMPTY
        ? "Query is empty"
        : `Query must be at least ${minLength} characters after normalization`
    );
    this.reason = reason;
    this.normalized = normalized;
    this.minLength = minLength;
  }
}

export class RemoteUnavailableError extends MarketSearchError {
  public readonly kind = SearchErrorKind.REMOTE_UNAVAILABLE;
  public readonly attempts: number;
  public readonly statusCode?: number;

  constructor(message: string, details: { attempts: number; statusCode?: number; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.attempts = details.attempts;
    this.statusCode = details.statusCode;
  }
}

export class MalformedResponseError extends MarketSearchError {
  public readonly kind = SearchErrorKind.MALFORMED_RESPONSE;

  /** Short description of what was wrong with the body */
  public readonly detail: string;

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Unexpected response format from market catalog: ${detail}`, options);
    this.detail = detail;
  }
}

/** Failures the catalog layer can produce */
export type CatalogError = RemoteUnavailableError | MalformedResponseError;

/** Every failure `search` can return */
export type SearchError = QueryValidationError | CatalogError;
