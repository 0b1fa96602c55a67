/**
 * Error Handler for Polymarket Gamma API
 *
 * Retry policy for catalog requests. Each attempt reports a typed outcome
 * (success, retryable failure, terminal failure); `decideRetry` turns that
 * outcome and the attempt number into the next step, and `ErrorHandler`
 * runs the loop.
 */

import { serviceLoggers, type Logger } from "../../utils/logger";

/**
 * Error types that can occur during API operations
 */
export enum GammaErrorType {
  /** Network-level errors (connection refused, DNS failure, etc.) */
  NETWORK = "NETWORK",

  /** Request timeout */
  TIMEOUT = "TIMEOUT",

  /** Server errors (5xx status codes) */
  SERVER = "SERVER",

  /** Rate limiting (429 status code) */
  RATE_LIMIT = "RATE_LIMIT",

  /** Client errors (4xx status codes, except rate limit) */
  CLIENT = "CLIENT",

  /** Body is not JSON or not in the expected shape */
  PARSE = "PARSE",

  UNKNOWN = "UNKNOWN",
}

/**
 * Details of one failed attempt
 */
export interface AttemptFailure {
  errorType: GammaErrorType;
  message: string;
  statusCode?: number;

  /** Server-requested wait from a Retry-After header, in milliseconds */
  retryAfterMs?: number;

  cause?: unknown;
}

/**
 * What a single attempt produced
 */
export type AttemptOutcome<T> =
  | { status: "success"; data: T }
  | { status: "retryable"; failure: AttemptFailure }
  | { status: "terminal"; failure: AttemptFailure };

/**
 * What to do after an attempt
 */
export type RetryDecision =
  | { action: "stop" }
  | { action: "retry"; delayMs: number }
  | { action: "fail"; exhausted: boolean };

export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;

  /** Delay before the second attempt; doubles for each one after */
  baseDelayMs: number;

  /** Longest server-requested wait honored; a longer Retry-After ends the loop */
  maxRetryAfterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxRetryAfterMs: 60_000,
};

/**
 * Error types worth another attempt
 */
export const RETRYABLE_ERROR_TYPES: readonly GammaErrorType[] = [
  GammaErrorType.NETWORK,
  GammaErrorType.TIMEOUT,
  GammaErrorType.SERVER,
  GammaErrorType.RATE_LIMIT,
];

/**
 * Exponential backoff: baseDelay * 2^attempt, attempt starting at 0
 */
export function calculateBackoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Parse a Retry-After header value (delta-seconds or HTTP-date)
 *
 * @returns Delay in milliseconds, or undefined if absent or unparseable
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (value === null || value === undefined || value.trim() === "") {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Classify an HTTP status code
 */
export function classifyStatus(statusCode: number): GammaErrorType {
  if (statusCode === 429) {
    return GammaErrorType.RATE_LIMIT;
  }
  if (statusCode >= 500) {
    return GammaErrorType.SERVER;
  }
  if (statusCode >= 400) {
    return GammaErrorType.CLIENT;
  }
  return GammaErrorType.UNKNOWN;
}

/**
 * Classify an error thrown while making a request
 */
export function classifyError(error: unknown): GammaErrorType {
  if (error instanceof SyntaxError) {
    return GammaErrorType.PARSE;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (
      error.name === "AbortError" ||
      error.name === "TimeoutError" ||
      message.includes("timeout") ||
      message.includes("aborted")
    ) {
      return GammaErrorType.TIMEOUT;
    }

    if (
      message.includes("network") ||
      message.includes("connection") ||
      message.includes("econnrefused") ||
      message.includes("econnreset") ||
      message.includes("enotfound") ||
      message.includes("fetch failed") ||
      (error.name === "TypeError" && message.includes("fetch"))
    ) {
      return GammaErrorType.NETWORK;
    }
  }

  return GammaErrorType.UNKNOWN;
}

/**
 * Build an attempt outcome from a failure, retryable or not by its type
 */
export function failureOutcome(failure: AttemptFailure): AttemptOutcome<never> {
  return RETRYABLE_ERROR_TYPES.includes(failure.errorType)
    ? { status: "retryable", failure }
    : { status: "terminal", failure };
}

/**
 * Decide what follows an attempt
 *
 * @param outcome - Result of the attempt
 * @param attempt - Zero-based number of the attempt that produced it
 * @param policy - Attempt budget, backoff base and Retry-After ceiling
 */
export function decideRetry(
  outcome: AttemptOutcome<unknown>,
  attempt: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): RetryDecision {
  switch (outcome.status) {
    case "success":
      return { action: "stop" };
    case "terminal":
      return { action: "fail", exhausted: false };
    case "retryable":
      if (attempt + 1 >= policy.maxAttempts) {
        return { action: "fail", exhausted: true };
      }
      if (outcome.failure.retryAfterMs !== undefined) {
        if (outcome.failure.retryAfterMs > policy.maxRetryAfterMs) {
          return { action: "fail", exhausted: true };
        }
        return { action: "retry", delayMs: outcome.failure.retryAfterMs };
      }
      return { action: "retry", delayMs: calculateBackoffDelay(attempt, policy.baseDelayMs) };
  }
}

/**
 * Result of running an operation through the handler
 */
export type ErrorHandlerResult<T> =
  | { success: true; data: T; attempts: number; totalTime: number }
  | {
      success: false;
      failure: AttemptFailure;
      /** True when the attempt budget ran out, false for terminal failures */
      exhausted: boolean;
      attempts: number;
      totalTime: number;
    };

export interface ErrorHandlerConfig extends Partial<RetryPolicy> {
  /** Waits between attempts; replaced in tests */
  sleep?: (ms: number) => Promise<void>;

  logger?: Logger;

  /** Label used in log lines */
  operation?: string;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs attempts until one succeeds, one fails terminally, or the budget ends
 *
 * @example
 * ```typescript
 * const handler = new ErrorHandler({ maxAttempts: 3 });
 * const result = await handler.execute(() => client.getJson("/markets"));
 * if (result.success) {
 *   console.log(result.data);
 * }
 * ```
 */
export class ErrorHandler {
  private readonly policy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly operation: string;

  constructor(config: ErrorHandlerConfig = {}) {
    this.policy = {
      maxAttempts: Math.max(1, config.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts),
      baseDelayMs: config.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
      maxRetryAfterMs: config.maxRetryAfterMs ?? DEFAULT_RETRY_POLICY.maxRetryAfterMs,
    };
    this.sleep = config.sleep ?? defaultSleep;
    this.logger = config.logger ?? serviceLoggers.catalogFetcher;
    this.operation = config.operation ?? "API call";
  }

  public getPolicy(): RetryPolicy {
    return { ...this.policy };
  }

  /**
   * Run `attemptFn` under the retry policy
   *
   * Errors thrown by `attemptFn` are classified and treated as failures.
   */
  public async execute<T>(
    attemptFn: (attempt: number) => Promise<AttemptOutcome<T>>
  ): Promise<ErrorHandlerResult<T>> {
    const startTime = Date.now();

    for (let attempt = 0; ; attempt++) {
      let outcome: AttemptOutcome<T>;
      try {
        outcome = await attemptFn(attempt);
      } catch (error) {
        outcome = failureOutcome({
          errorType: classifyError(error),
          message: error instanceof Error ? error.message : String(error),
          cause: error,
        });
      }

      if (outcome.status === "success") {
        return {
          success: true,
          data: outcome.data,
          attempts: attempt + 1,
          totalTime: Date.now() - startTime,
        };
      }

      const decision = decideRetry(outcome, attempt, this.policy);
      const { failure } = outcome;
      const logData = {
        errorType: failure.errorType,
        statusCode: failure.statusCode,
        attempt: attempt + 1,
        maxAttempts: this.policy.maxAttempts,
      };

      if (decision.action === "retry") {
        this.logger.warn(`${this.operation} failed: ${failure.message}`, {
          ...logData,
          retryDelay: decision.delayMs,
        });
        await this.sleep(decision.delayMs);
        continue;
      }

      this.logger.error(`${this.operation} failed: ${failure.message}`, {
        ...logData,
        exhausted: decision.action === "fail" && decision.exhausted,
      });

      return {
        success: false,
        failure,
        exhausted: decision.action === "fail" && decision.exhausted,
        attempts: attempt + 1,
        totalTime: Date.now() - startTime,
      };
    }
  }
}

export function createErrorHandler(config: ErrorHandlerConfig = {}): ErrorHandler {
  return new ErrorHandler(config);
}
