// ============================================
// fedora-l10n Error Types
// ============================================

/**
 * Categorized error codes.
 *
 * Categories:
 * - 1xxx: Configuration errors
 * - 2xxx: Weblate API errors
 * - 3xxx: Cache errors
 * - 4xxx: Credential errors
 * - 5xxx: System errors
 */
export enum ErrorCode {
  // 1xxx - Configuration errors
  CONFIG_INVALID = 1001,
  CONFIG_NOT_FOUND = 1002,
  CONFIG_PARSE_ERROR = 1003,

  // 2xxx - Weblate API errors
  API_RATE_LIMIT = 2001,
  API_AUTH_FAILED = 2002,
  API_NOT_FOUND = 2003,
  API_HTTP_ERROR = 2004,
  API_NETWORK_ERROR = 2005,
  API_TIMEOUT = 2006,
  API_INVALID_RESPONSE = 2007,

  // 3xxx - Cache errors
  CACHE_IO_ERROR = 3001,

  // 4xxx - Credential errors
  CREDENTIAL_NOT_FOUND = 4001,
  CREDENTIAL_STORE_FAILED = 4002,

  // 5xxx - System errors
  SYSTEM_IO_ERROR = 5001,
  SYSTEM_ABORTED = 5002,
  SYSTEM_UNKNOWN = 5999,
}

/**
 * Error severity levels that determine handling strategy.
 */
export enum ErrorSeverity {
  /** Can retry automatically */
  RECOVERABLE = "recoverable",
  /** User needs to fix something */
  USER_ACTION = "user_action",
  /** Cannot continue */
  FATAL = "fatal",
}

/**
 * Infers the appropriate severity level from an error code.
 *
 * - Rate limit, timeout, network, cache I/O → RECOVERABLE
 * - Config, auth, not found, bad payloads, credentials → USER_ACTION
 * - Everything else → FATAL
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.API_RATE_LIMIT:
    case ErrorCode.API_NETWORK_ERROR:
    case ErrorCode.API_TIMEOUT:
    case ErrorCode.CACHE_IO_ERROR:
    case ErrorCode.SYSTEM_IO_ERROR:
      return ErrorSeverity.RECOVERABLE;

    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_NOT_FOUND:
    case ErrorCode.CONFIG_PARSE_ERROR:
    case ErrorCode.API_AUTH_FAILED:
    case ErrorCode.API_NOT_FOUND:
    case ErrorCode.API_HTTP_ERROR:
    case ErrorCode.API_INVALID_RESPONSE:
    case ErrorCode.CREDENTIAL_NOT_FOUND:
    case ErrorCode.CREDENTIAL_STORE_FAILED:
    case ErrorCode.SYSTEM_ABORTED:
      return ErrorSeverity.USER_ACTION;

    default:
      return ErrorSeverity.FATAL;
  }
}

/**
 * Options for creating an L10nError.
 */
export interface L10nErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
  /** Whether this error can be retried (overrides the severity default) */
  isRetryable?: boolean;
  /** Suggested delay before retry in milliseconds */
  retryDelay?: number;
}

/**
 * Every failure the core reports: config, credentials, Weblate and I/O.
 * The code decides severity; retryability follows severity unless the
 * thrower says otherwise.
 */
export class L10nError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly isRetryable: boolean;
  /** Server-suggested wait in ms; only kept on retryable errors */
  readonly retryDelay: number | undefined;
  readonly context: Record<string, unknown> | undefined;

  constructor(message: string, code: ErrorCode, options: L10nErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "L10nError";
    this.code = code;
    this.severity = inferSeverity(code);
    this.isRetryable = options.isRetryable ?? this.severity === ErrorSeverity.RECOVERABLE;
    this.retryDelay = this.isRetryable ? options.retryDelay : undefined;
    this.context = options.context;
  }

  toJSON(): Record<string, unknown> {
    const { name, message, code, severity, isRetryable, retryDelay, context } = this;
    return {
      name,
      message,
      code,
      severity,
      isRetryable,
      retryDelay,
      context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Type guard to check if an error is an L10nError with FATAL severity.
 */
export function isFatalError(error: unknown): error is L10nError {
  return error instanceof L10nError && error.severity === ErrorSeverity.FATAL;
}

/**
 * Checks if an error is retryable.
 * Returns true if error is an L10nError with isRetryable=true.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof L10nError && error.isRetryable;
}
