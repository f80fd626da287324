/**
 * Process exit codes, following Unix conventions:
 * - 0: Success
 * - 1: General error
 * - 2: Usage/argument error
 * - 130: Interrupted (128 + SIGINT)
 *
 * @module cli/commands/exit-codes
 */

import { isAbortError } from "@fedora-l10n/core";
import { CommanderError } from "commander";

export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Usage/argument error */
  USAGE_ERROR: 2,
  /** Interrupted by signal (128 + SIGINT=2) */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a thrown value to an exit code.
 *
 * @example
 * ```typescript
 * try {
 *   await program.parseAsync();
 * } catch (error) {
 *   process.exitCode = exitCodeFor(error);
 * }
 * ```
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (isAbortError(error)) {
    return EXIT_CODES.INTERRUPTED;
  }
  if (error instanceof UsageError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof CommanderError) {
    // --help and --version exit through here too
    return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
  }
  return EXIT_CODES.ERROR;
}

/**
 * Bad arguments that commander itself cannot detect, such as an invalid
 * `--lang` value.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
