// ============================================
// Rate Limiting Type Definitions
// ============================================

/**
 * Exponential backoff settings.
 */
export interface BackoffConfig {
  /** Delay after the first failure in milliseconds */
  readonly baseDelayMs: number;
  /** Ceiling for any single delay in milliseconds */
  readonly maxDelayMs: number;
}

/**
 * Minimum spacing between network dispatches.
 */
export interface ThrottleConfig {
  readonly minIntervalMs: number;
}

/**
 * Backoff state snapshot for monitoring.
 */
export interface BackoffState {
  /** Consecutive failures since the last success */
  readonly failures: number;
  /** Delay the next attempt will wait, in milliseconds */
  readonly delayMs: number;
  /** Last server-provided retry hint, if any */
  readonly retryAfterMs: number | null;
}

export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  baseDelayMs: 600,
  maxDelayMs: 30_000,
};

export const DEFAULT_THROTTLE_CONFIG: ThrottleConfig = {
  minIntervalMs: 600,
};
