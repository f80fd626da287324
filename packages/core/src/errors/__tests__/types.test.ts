import { describe, expect, it } from "vitest";
import { FetchError } from "../fetch.js";
import {
  ErrorCode,
  ErrorSeverity,
  inferSeverity,
  isFatalError,
  isRetryableError,
  L10nError,
} from "../types.js";

describe("inferSeverity", () => {
  it("treats transient API failures as recoverable", () => {
    expect(inferSeverity(ErrorCode.API_RATE_LIMIT)).toBe(ErrorSeverity.RECOVERABLE);
    expect(inferSeverity(ErrorCode.API_NETWORK_ERROR)).toBe(ErrorSeverity.RECOVERABLE);
    expect(inferSeverity(ErrorCode.API_TIMEOUT)).toBe(ErrorSeverity.RECOVERABLE);
  });

  it("asks the user to act on config and auth problems", () => {
    expect(inferSeverity(ErrorCode.CONFIG_INVALID)).toBe(ErrorSeverity.USER_ACTION);
    expect(inferSeverity(ErrorCode.API_AUTH_FAILED)).toBe(ErrorSeverity.USER_ACTION);
    expect(inferSeverity(ErrorCode.API_INVALID_RESPONSE)).toBe(ErrorSeverity.USER_ACTION);
  });

  it("falls back to fatal", () => {
    expect(inferSeverity(ErrorCode.SYSTEM_UNKNOWN)).toBe(ErrorSeverity.FATAL);
  });
});

describe("L10nError", () => {
  it("derives retryability from severity unless overridden", () => {
    expect(new L10nError("slow", ErrorCode.API_TIMEOUT).isRetryable).toBe(true);
    expect(new L10nError("bad", ErrorCode.CONFIG_INVALID).isRetryable).toBe(false);
    expect(
      new L10nError("5xx", ErrorCode.API_HTTP_ERROR, { isRetryable: true }).isRetryable
    ).toBe(true);
  });

  it("hides retryDelay when not retryable", () => {
    const error = new L10nError("nope", ErrorCode.API_NOT_FOUND, { retryDelay: 500 });
    expect(error.retryDelay).toBeUndefined();
  });

  it("serializes to JSON with the cause message", () => {
    const cause = new Error("socket hang up");
    const error = new L10nError("failed", ErrorCode.API_NETWORK_ERROR, {
      cause,
      context: { url: "https://example.test/api/projects/" },
    });

    expect(error.toJSON()).toEqual({
      name: "L10nError",
      message: "failed",
      code: ErrorCode.API_NETWORK_ERROR,
      severity: ErrorSeverity.RECOVERABLE,
      isRetryable: true,
      retryDelay: undefined,
      context: { url: "https://example.test/api/projects/" },
      cause: "socket hang up",
    });
  });

  it("is detected by the guards", () => {
    expect(isFatalError(new L10nError("boom", ErrorCode.SYSTEM_UNKNOWN))).toBe(true);
    expect(isRetryableError(new L10nError("limit", ErrorCode.API_RATE_LIMIT))).toBe(true);
    expect(isRetryableError(new Error("plain"))).toBe(false);
  });
});

describe("FetchError", () => {
  const url = "https://example.test/api/projects/";

  it("maps 429 to a retryable rate-limit error with the hint", () => {
    const error = FetchError.fromStatus(url, 429, "Too Many Requests", 2000);

    expect(error).toBeInstanceOf(L10nError);
    expect(error.code).toBe(ErrorCode.API_RATE_LIMIT);
    expect(error.status).toBe(429);
    expect(error.isRetryable).toBe(true);
    expect(error.retryDelay).toBe(2000);
    expect(error.message).toBe("Rate limited by Weblate (HTTP 429 Too Many Requests)");
  });

  it("retries server errors but not client errors", () => {
    expect(FetchError.fromStatus(url, 503).isRetryable).toBe(true);
    expect(FetchError.fromStatus(url, 400).isRetryable).toBe(false);
    expect(FetchError.fromStatus(url, 404).code).toBe(ErrorCode.API_NOT_FOUND);
    expect(FetchError.fromStatus(url, 401).code).toBe(ErrorCode.API_AUTH_FAILED);
  });

  it("describes malformed payloads and is not retryable", () => {
    const error = FetchError.malformed(url, "Unexpected token < in JSON", 200);

    expect(error.code).toBe(ErrorCode.API_INVALID_RESPONSE);
    expect(error.message).toBe("Malformed response from Weblate: Unexpected token < in JSON");
    expect(error.isRetryable).toBe(false);
    expect(error.context).toEqual({ url, status: 200 });
  });
});
