// ============================================
// Retry Header Parsing
// ============================================

/**
 * Minimal header lookup, satisfied by both `Headers` and the pooled
 * response headers.
 */
export interface HeaderSource {
  get(name: string): string | null;
}

/**
 * Result of parsing retry-related headers.
 */
export interface RetryHeadersResult {
  /** Parsed retry delay in milliseconds, or null if no valid header found */
  retryAfterMs: number | null;
  source: "retry-after" | "x-ratelimit-reset" | null;
}

function parseSeconds(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10) * 1000;
}

/**
 * Retry-After is either delta-seconds or an HTTP-date.
 * A date in the past yields 0.
 */
function parseRetryAfter(value: string, now: number): number | null {
  const seconds = parseSeconds(value);
  if (seconds !== null) {
    return seconds;
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, date - now);
}

/**
 * Parses the retry hint of a throttled Weblate response.
 *
 * Weblate sends `Retry-After` on 429 responses and
 * `X-RateLimit-Reset` (seconds until the window resets) on every response.
 * `Retry-After` wins when both are present.
 *
 * @example
 * ```typescript
 * const { retryAfterMs } = parseRetryHeaders(response.headers);
 * if (retryAfterMs !== null) {
 *   backoff.recordFailure(retryAfterMs);
 * }
 * ```
 */
export function parseRetryHeaders(headers: HeaderSource, now = Date.now()): RetryHeadersResult {
  const retryAfter = headers.get("retry-after");
  if (retryAfter) {
    const ms = parseRetryAfter(retryAfter, now);
    if (ms !== null) {
      return { retryAfterMs: ms, source: "retry-after" };
    }
  }

  const reset = headers.get("x-ratelimit-reset");
  if (reset) {
    const ms = parseSeconds(reset);
    if (ms !== null) {
      return { retryAfterMs: ms, source: "x-ratelimit-reset" };
    }
  }

  return { retryAfterMs: null, source: null };
}
