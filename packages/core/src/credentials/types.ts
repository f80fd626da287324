/**
 * API Key Types
 *
 * @module credentials/types
 */

import type { Result } from "../types/result.js";

/** Where a key was found */
export type ApiKeySource = "env" | "file";

/**
 * A resolved Weblate API key.
 */
export interface ApiKey {
  readonly value: string;
  readonly source: ApiKeySource;
  /** Environment variable name or file path */
  readonly location: string;
  /** First and last three characters, for display */
  readonly maskedHint: string;
}

export type ApiKeyStoreErrorCode = "READ_ONLY" | "INVALID_KEY" | "IO_ERROR";

/**
 * Error from API key store operations
 */
export interface ApiKeyStoreError {
  readonly code: ApiKeyStoreErrorCode;
  readonly message: string;
  readonly store: ApiKeySource;
  readonly cause?: Error;
}

/**
 * A place an API key can live. Lookups never throw; failures come back as
 * `Err` values.
 */
export interface ApiKeyStore {
  readonly name: ApiKeySource;
  /** Higher is consulted first */
  readonly priority: number;
  readonly readOnly: boolean;

  get(): Promise<Result<ApiKey | null, ApiKeyStoreError>>;
  set(value: string): Promise<Result<ApiKey, ApiKeyStoreError>>;
  /** Returns whether a key was removed */
  delete(): Promise<Result<boolean, ApiKeyStoreError>>;
}

export function createStoreError(
  code: ApiKeyStoreErrorCode,
  message: string,
  store: ApiKeySource,
  cause?: unknown
): ApiKeyStoreError {
  return { code, message, store, cause: cause instanceof Error ? cause : undefined };
}

/**
 * Shows first 3 and last 3 characters with an ellipsis; short keys are
 * hidden entirely.
 *
 * @example
 * ```typescript
 * generateMaskedHint("wlu_0123456789abcdef"); // "wlu...def"
 * generateMaskedHint("short");                // "***"
 * ```
 */
export function generateMaskedHint(value: string): string {
  if (value.length <= 8) {
    return "***";
  }
  return `${value.slice(0, 3)}...${value.slice(-3)}`;
}

/**
 * Trimmed key, or null when it is empty or contains whitespace.
 */
export function normalizeApiKey(value: string): string | null {
  const trimmed = value.trim();
  if (trimmed.length === 0 || /\s/.test(trimmed)) {
    return null;
  }
  return trimmed;
}
