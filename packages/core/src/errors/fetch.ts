// ============================================
// Weblate Fetch Errors
// ============================================

import { ErrorCode, L10nError, type L10nErrorOptions } from "./types.js";

/**
 * Options for FetchError beyond the base error options.
 */
export interface FetchErrorOptions extends L10nErrorOptions {
  /** Endpoint URL that failed */
  url: string;
  /** HTTP status, when a response was received */
  status?: number;
}

/**
 * Failure of a single Weblate request: a non-2xx status, a body that is not
 * JSON, or JSON of an unexpected shape.
 *
 * Retryability follows the status: 429 and 5xx are retryable, other 4xx
 * and malformed payloads are not.
 */
export class FetchError extends L10nError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, code: ErrorCode, options: FetchErrorOptions) {
    const { url, status, ...rest } = options;
    super(message, code, {
      ...rest,
      context: { ...rest.context, url, status },
    });
    this.name = "FetchError";
    this.url = url;
    this.status = status;
  }

  /**
   * Build the error for a non-2xx response.
   *
   * @param retryAfterMs - Parsed Retry-After hint, used for 429 responses
   */
  static fromStatus(
    url: string,
    status: number,
    statusText = "",
    retryAfterMs: number | null = null
  ): FetchError {
    const label = statusText ? `${status} ${statusText}` : `${status}`;

    if (status === 429) {
      return new FetchError(`Rate limited by Weblate (HTTP ${label})`, ErrorCode.API_RATE_LIMIT, {
        url,
        status,
        retryDelay: retryAfterMs ?? undefined,
      });
    }
    if (status === 401 || status === 403) {
      return new FetchError(
        `Weblate rejected the request (HTTP ${label}); check the API key`,
        ErrorCode.API_AUTH_FAILED,
        { url, status }
      );
    }
    if (status === 404) {
      return new FetchError(`Not found on Weblate (HTTP ${label})`, ErrorCode.API_NOT_FOUND, {
        url,
        status,
      });
    }
    return new FetchError(`Weblate request failed (HTTP ${label})`, ErrorCode.API_HTTP_ERROR, {
      url,
      status,
      isRetryable: status >= 500,
    });
  }

  /**
   * Build the error for a body that could not be parsed or validated.
   *
   * @param description - Parser or schema message
   */
  static malformed(url: string, description: string, status?: number, cause?: unknown): FetchError {
    return new FetchError(
      `Malformed response from Weblate: ${description}`,
      ErrorCode.API_INVALID_RESPONSE,
      { url, status, cause }
    );
  }
}
