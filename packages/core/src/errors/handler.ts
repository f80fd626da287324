// ============================================
// Error Handler
// Normalizes thrown values, logs them and phrases user notices
// ============================================

import type { Logger } from "../logger/logger.js";
import { FetchError } from "./fetch.js";
import { NetworkError } from "./network.js";
import { isAbortError } from "./retry.js";
import { ErrorCode, ErrorSeverity, L10nError } from "./types.js";

export interface ErrorHandlerOptions {
  /** Logger instance for error logging */
  logger: Logger;
}

/**
 * Centralized error handler for the CLI and the TUI.
 *
 * @example
 * ```typescript
 * const handler = new ErrorHandler({ logger });
 *
 * try {
 *   await client.listProjects();
 * } catch (error) {
 *   const normalized = handler.handle(error);
 *   setNotice(handler.notice(normalized));
 * }
 * ```
 */
export class ErrorHandler {
  private readonly logger: Logger;

  constructor(options: ErrorHandlerOptions) {
    this.logger = options.logger;
  }

  /**
   * Normalize any thrown value to an L10nError and log it at a level
   * matching its severity.
   */
  handle(error: unknown): L10nError {
    const normalized = this.normalize(error);
    this.logError(normalized);
    return normalized;
  }

  /**
   * Whether the application can keep going after this error.
   * Non-L10nError values are assumed recoverable.
   */
  isRecoverable(error: unknown): boolean {
    if (error instanceof L10nError) {
      return error.severity !== ErrorSeverity.FATAL;
    }
    return true;
  }

  /**
   * One-line, user-facing notice for a failed refresh.
   */
  notice(error: unknown): string {
    return `Unable to refresh: ${describeError(error)}`;
  }

  normalize(error: unknown): L10nError {
    if (error instanceof L10nError) {
      return error;
    }

    if (isAbortError(error)) {
      return new L10nError("Request cancelled", ErrorCode.SYSTEM_ABORTED, { cause: error });
    }

    if (error instanceof Error) {
      return new L10nError(error.message, ErrorCode.SYSTEM_UNKNOWN, {
        cause: error,
        context: { originalName: error.name },
      });
    }

    if (typeof error === "string") {
      return new L10nError(error, ErrorCode.SYSTEM_UNKNOWN);
    }

    return new L10nError("An unknown error occurred", ErrorCode.SYSTEM_UNKNOWN, {
      context: {
        originalValue: String(error),
        originalType: typeof error,
      },
    });
  }

  private logError(error: L10nError): void {
    const fields = { code: error.code, severity: error.severity, ...error.context, cause: error.cause };

    if (error.severity === ErrorSeverity.FATAL) {
      this.logger.error(error.message, fields);
    } else {
      this.logger.warn(error.message, fields);
    }
  }
}

/**
 * Short description of an error for status lines and stderr.
 */
export function describeError(error: unknown): string {
  if (error instanceof FetchError && error.status !== undefined) {
    return `${error.message} [${error.url}]`;
  }
  if (error instanceof NetworkError) {
    return `${error.message} (${error.originalCode})`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
