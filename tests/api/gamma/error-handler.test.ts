/**
 * Tests for the Gamma API retry policy
 */

import { describe, it, expect, vi } from "vitest";
import {
  calculateBackoffDelay,
  classifyError,
  classifyStatus,
  createErrorHandler,
  decideRetry,
  DEFAULT_RETRY_POLICY,
  ErrorHandler,
  failureOutcome,
  GammaErrorType,
  parseRetryAfter,
  type AttemptOutcome,
} from "@/api/gamma/error-handler";
import { silentLogger } from "../../fixtures/markets";

function retryable(errorType: GammaErrorType, retryAfterMs?: number): AttemptOutcome<never> {
  return { status: "retryable", failure: { errorType, message: "failed", retryAfterMs } };
}

describe("calculateBackoffDelay", () => {
  it("should double the delay for each attempt", () => {
    expect(calculateBackoffDelay(0, 1000)).toBe(1000);
    expect(calculateBackoffDelay(1, 1000)).toBe(2000);
    expect(calculateBackoffDelay(2, 1000)).toBe(4000);
    expect(calculateBackoffDelay(3, 250)).toBe(2000);
  });
});

describe("parseRetryAfter", () => {
  it("should read delta-seconds", () => {
    expect(parseRetryAfter("3")).toBe(3000);
    expect(parseRetryAfter(" 0 ")).toBe(0);
  });

  it("should read an HTTP-date relative to now", () => {
    const now = Date.parse("2025-06-01T12:00:00Z");
    expect(parseRetryAfter("Sun, 01 Jun 2025 12:00:05 GMT", now)).toBe(5000);
  });

  it("should not return a negative delay for a past date", () => {
    const now = Date.parse("2025-06-01T12:00:00Z");
    expect(parseRetryAfter("Sun, 01 Jun 2025 11:59:00 GMT", now)).toBe(0);
  });

  it("should return undefined for missing or unparseable values", () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter("")).toBeUndefined();
    expect(parseRetryAfter("soon")).toBeUndefined();
  });
});

describe("classifyStatus", () => {
  it("should map status codes to error types", () => {
    expect(classifyStatus(429)).toBe(GammaErrorType.RATE_LIMIT);
    expect(classifyStatus(500)).toBe(GammaErrorType.SERVER);
    expect(classifyStatus(503)).toBe(GammaErrorType.SERVER);
    expect(classifyStatus(400)).toBe(GammaErrorType.CLIENT);
    expect(classifyStatus(404)).toBe(GammaErrorType.CLIENT);
    expect(classifyStatus(302)).toBe(GammaErrorType.UNKNOWN);
  });
});

describe("classifyError", () => {
  it("should classify aborts and timeouts", () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    expect(classifyError(abort)).toBe(GammaErrorType.TIMEOUT);
    expect(classifyError(new Error("Request timeout"))).toBe(GammaErrorType.TIMEOUT);
  });

  it("should classify network failures", () => {
    expect(classifyError(new TypeError("fetch failed"))).toBe(GammaErrorType.NETWORK);
    expect(classifyError(new Error("connect ECONNREFUSED 127.0.0.1:443"))).toBe(GammaErrorType.NETWORK);
    expect(classifyError(new Error("getaddrinfo ENOTFOUND gamma.test"))).toBe(GammaErrorType.NETWORK);
  });

  it("should classify JSON syntax errors as parse failures", () => {
    expect(classifyError(new SyntaxError("Unexpected token < in JSON"))).toBe(GammaErrorType.PARSE);
  });

  it("should fall back to unknown", () => {
    expect(classifyError(new Error("something odd"))).toBe(GammaErrorType.UNKNOWN);
    expect(classifyError("a string")).toBe(GammaErrorType.UNKNOWN);
  });
});

describe("failureOutcome", () => {
  it("should mark transient errors retryable", () => {
    for (const errorType of [
      GammaErrorType.NETWORK,
      GammaErrorType.TIMEOUT,
      GammaErrorType.SERVER,
      GammaErrorType.RATE_LIMIT,
    ]) {
      expect(failureOutcome({ errorType, message: "x" }).status).toBe("retryable");
    }
  });

  it("should mark everything else terminal", () => {
    for (const errorType of [GammaErrorType.CLIENT, GammaErrorType.PARSE, GammaErrorType.UNKNOWN]) {
      expect(failureOutcome({ errorType, message: "x" }).status).toBe("terminal");
    }
  });
});

describe("decideRetry", () => {
  it("should stop on success", () => {
    expect(decideRetry({ status: "success", data: 1 }, 0)).toEqual({ action: "stop" });
  });

  it("should fail immediately on a terminal outcome", () => {
    const outcome = failureOutcome({ errorType: GammaErrorType.CLIENT, message: "HTTP 404" });
    expect(decideRetry(outcome, 0)).toEqual({ action: "fail", exhausted: false });
  });

  it("should back off exponentially while attempts remain", () => {
    expect(decideRetry(retryable(GammaErrorType.SERVER), 0)).toEqual({ action: "retry", delayMs: 1000 });
    expect(decideRetry(retryable(GammaErrorType.SERVER), 1)).toEqual({ action: "retry", delayMs: 2000 });
  });

  it("should fail as exhausted on the last attempt", () => {
    expect(decideRetry(retryable(GammaErrorType.SERVER), 2)).toEqual({ action: "fail", exhausted: true });
  });

  it("should honor a server-requested delay", () => {
    expect(decideRetry(retryable(GammaErrorType.RATE_LIMIT, 7000), 0)).toEqual({
      action: "retry",
      delayMs: 7000,
    });
  });

  it("should give up when the server asks for a longer wait than allowed", () => {
    expect(decideRetry(retryable(GammaErrorType.RATE_LIMIT, 86_400_000), 0)).toEqual({
      action: "fail",
      exhausted: true,
    });
    expect(decideRetry(retryable(GammaErrorType.RATE_LIMIT, 60_000), 0)).toEqual({
      action: "retry",
      delayMs: 60_000,
    });
  });

  it("should use the given policy", () => {
    const policy = { ...DEFAULT_RETRY_POLICY, maxAttempts: 5, baseDelayMs: 100 };
    expect(decideRetry(retryable(GammaErrorType.TIMEOUT), 3, policy)).toEqual({ action: "retry", delayMs: 800 });
    expect(decideRetry(retryable(GammaErrorType.TIMEOUT), 4, policy)).toEqual({ action: "fail", exhausted: true });
  });

  it("should never retry with a single attempt", () => {
    const policy = { ...DEFAULT_RETRY_POLICY, maxAttempts: 1 };
    expect(decideRetry(retryable(GammaErrorType.NETWORK), 0, policy)).toEqual({ action: "fail", exhausted: true });
  });
});

describe("ErrorHandler", () => {
  function handler(overrides: { maxAttempts?: number; maxRetryAfterMs?: number } = {}) {
    const sleep = vi.fn<[number], Promise<void>>().mockResolvedValue(undefined);
    return { sleep, handler: new ErrorHandler({ sleep, logger: silentLogger, ...overrides }) };
  }

  it("should use the default policy", () => {
    expect(createErrorHandler().getPolicy()).toEqual(DEFAULT_RETRY_POLICY);
  });

  it("should clamp the attempt budget to at least one", () => {
    expect(new ErrorHandler({ maxAttempts: 0 }).getPolicy().maxAttempts).toBe(1);
  });

  it("should return the first success", async () => {
    const { handler: h, sleep } = handler();
    const attemptFn = vi.fn(async (): Promise<AttemptOutcome<string>> => ({ status: "success", data: "ok" }));

    const result = await h.execute(attemptFn);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toBe("ok");
      expect(result.attempts).toBe(1);
    }
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should retry retryable failures until one succeeds", async () => {
    const { handler: h, sleep } = handler();
    const attemptFn = vi
      .fn<[number], Promise<AttemptOutcome<string>>>()
      .mockResolvedValueOnce(retryable(GammaErrorType.SERVER))
      .mockResolvedValueOnce(retryable(GammaErrorType.TIMEOUT))
      .mockResolvedValueOnce({ status: "success", data: "ok" });

    const result = await h.execute(attemptFn);

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(3);
    expect(attemptFn.mock.calls).toEqual([[0], [1], [2]]);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it("should stop after the attempt budget", async () => {
    const { handler: h, sleep } = handler();
    const attemptFn = vi.fn(async (): Promise<AttemptOutcome<string>> => retryable(GammaErrorType.SERVER));

    const result = await h.execute(attemptFn);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.exhausted).toBe(true);
      expect(result.attempts).toBe(3);
      expect(result.failure.errorType).toBe(GammaErrorType.SERVER);
    }
    expect(attemptFn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("should not retry terminal failures", async () => {
    const { handler: h, sleep } = handler();
    const attemptFn = vi.fn(
      async (): Promise<AttemptOutcome<string>> =>
        failureOutcome({ errorType: GammaErrorType.CLIENT, message: "HTTP 404", statusCode: 404 })
    );

    const result = await h.execute(attemptFn);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.exhausted).toBe(false);
      expect(result.attempts).toBe(1);
      expect(result.failure.statusCode).toBe(404);
    }
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should treat a thrown error as a failed attempt", async () => {
    const { handler: h } = handler({ maxAttempts: 2 });
    const attemptFn = vi
      .fn<[number], Promise<AttemptOutcome<string>>>()
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce({ status: "success", data: "ok" });

    const result = await h.execute(attemptFn);

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(2);
  });

  it("should wait for Retry-After on rate limits", async () => {
    const { handler: h, sleep } = handler();
    const attemptFn = vi
      .fn<[number], Promise<AttemptOutcome<string>>>()
      .mockResolvedValueOnce(retryable(GammaErrorType.RATE_LIMIT, 2500))
      .mockResolvedValueOnce({ status: "success", data: "ok" });

    await h.execute(attemptFn);

    expect(sleep).toHaveBeenCalledWith(2500);
  });

  it("should not sleep through an excessive Retry-After", async () => {
    const { handler: h, sleep } = handler({ maxRetryAfterMs: 10_000 });
    const attemptFn = vi.fn(
      async (): Promise<AttemptOutcome<string>> => retryable(GammaErrorType.RATE_LIMIT, 30_000)
    );

    const result = await h.execute(attemptFn);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.exhausted).toBe(true);
      expect(result.attempts).toBe(1);
    }
    expect(attemptFn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
