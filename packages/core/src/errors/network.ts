// ============================================
// Network Error Detection and Wrapping
// ============================================

import { ErrorCode, L10nError, type L10nErrorOptions } from "./types.js";

/**
 * System error codes that indicate a transient network failure.
 */
export const NETWORK_ERROR_CODES = [
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ECONNREFUSED",
  "ENETUNREACH",
  "EAI_AGAIN",
  "EPIPE",
  "ECONNABORTED",
  "EHOSTUNREACH",
  "ENETDOWN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
] as const;

export type NetworkErrorCode = (typeof NETWORK_ERROR_CODES)[number];

const NETWORK_ERROR_MESSAGES: Record<NetworkErrorCode, string> = {
  ECONNRESET: "Connection was reset by the server",
  ETIMEDOUT: "Connection timed out",
  ENOTFOUND: "Could not resolve hostname",
  ECONNREFUSED: "Connection refused by the server",
  ENETUNREACH: "Network is unreachable",
  EAI_AGAIN: "DNS lookup timed out",
  EPIPE: "Connection was closed unexpectedly",
  ECONNABORTED: "Connection was aborted",
  EHOSTUNREACH: "Host is unreachable",
  ENETDOWN: "Network is down",
  UND_ERR_SOCKET: "Connection was closed unexpectedly",
  UND_ERR_CONNECT_TIMEOUT: "Connection timed out",
  UND_ERR_HEADERS_TIMEOUT: "Server did not respond in time",
  UND_ERR_BODY_TIMEOUT: "Server stopped sending data",
};

function isNetworkErrorCode(code: string): code is NetworkErrorCode {
  return NETWORK_ERROR_CODES.some((known) => known === code);
}

function readCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Gets the network error code from an error or from its cause chain.
 *
 * undici reports connection failures as `TypeError: fetch failed` with the
 * system error attached as `cause`, so the chain is walked a few levels.
 *
 * @returns The network error code or null if not a network error
 */
export function getNetworkErrorCode(error: unknown): NetworkErrorCode | null {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    const code = readCode(current);
    if (code !== undefined && isNetworkErrorCode(code)) {
      return code;
    }
    current = current.cause;
  }
  return null;
}

/**
 * Checks if an error is a network-related error.
 *
 * @example
 * ```typescript
 * try {
 *   await fetch(url);
 * } catch (error) {
 *   if (isNetworkError(error)) {
 *     // transient, worth retrying
 *   }
 * }
 * ```
 */
export function isNetworkError(error: unknown): boolean {
  return getNetworkErrorCode(error) !== null;
}

/**
 * Wraps a low-level network failure. Always retryable.
 */
export class NetworkError extends L10nError {
  /** The original system error code (e.g., ECONNRESET) */
  readonly originalCode: string;

  constructor(
    message: string,
    originalCode: string,
    options?: Omit<L10nErrorOptions, "isRetryable">
  ) {
    super(message, ErrorCode.API_NETWORK_ERROR, {
      ...options,
      context: { ...options?.context, originalCode },
      isRetryable: true,
    });
    this.name = "NetworkError";
    this.originalCode = originalCode;
  }
}

/**
 * Wraps a network error with a user-friendly NetworkError, or returns the
 * original value untouched when it is not one.
 */
export function maybeWrapNetworkError(error: unknown, url?: string): unknown {
  const code = getNetworkErrorCode(error);
  if (code === null) {
    return error;
  }
  return new NetworkError(NETWORK_ERROR_MESSAGES[code], code, {
    cause: error,
    context: {
      url,
      originalMessage: error instanceof Error ? error.message : String(error),
    },
  });
}
