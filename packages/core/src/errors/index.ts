// ============================================
// Errors - Barrel Export
// ============================================

export { FetchError, type FetchErrorOptions } from "./fetch.js";
export { describeError, ErrorHandler, type ErrorHandlerOptions } from "./handler.js";
export { type HeaderSource, parseRetryHeaders, type RetryHeadersResult } from "./headers.js";
export {
  getNetworkErrorCode,
  isNetworkError,
  maybeWrapNetworkError,
  NETWORK_ERROR_CODES,
  NetworkError,
  type NetworkErrorCode,
} from "./network.js";
export { AbortError, abortableSleep, isAbortError, throwIfAborted } from "./retry.js";
export {
  ErrorCode,
  ErrorSeverity,
  inferSeverity,
  isFatalError,
  isRetryableError,
  L10nError,
  type L10nErrorOptions,
} from "./types.js";
