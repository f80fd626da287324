// ============================================
// Exponential Backoff
// ============================================

import { abortableSleep } from "../errors/retry.js";
import { type BackoffConfig, type BackoffState, DEFAULT_BACKOFF_CONFIG } from "./types.js";

/**
 * Tracks consecutive failures and derives the wait before the next attempt.
 *
 * The delay is `baseDelayMs * 2^(failures - 1)`, raised to the last
 * Retry-After hint when that is larger, and never above `maxDelayMs`.
 * With no failures recorded the delay is zero.
 *
 * @example
 * ```typescript
 * const backoff = new Backoff({ baseDelayMs: 600, maxDelayMs: 30_000 });
 *
 * await backoff.wait(signal);
 * try {
 *   const data = await fetchIt();
 *   backoff.reset();
 * } catch (error) {
 *   backoff.recordFailure();
 *   throw error;
 * }
 * ```
 */
export class Backoff {
  private readonly config: BackoffConfig;
  private failureCount = 0;
  private retryAfterMs: number | null = null;
  private lastFailureAt: number | null = null;

  constructor(config: Partial<BackoffConfig> = {}) {
    this.config = { ...DEFAULT_BACKOFF_CONFIG, ...config };

    if (this.config.baseDelayMs < 0) {
      throw new Error("baseDelayMs must not be negative");
    }
    if (this.config.maxDelayMs < this.config.baseDelayMs) {
      throw new Error("maxDelayMs must be at least baseDelayMs");
    }
  }

  get failures(): number {
    return this.failureCount;
  }

  /**
   * Delay the next attempt waits, in milliseconds.
   */
  get delayMs(): number {
    if (this.failureCount === 0) {
      return 0;
    }
    const exponential = this.config.baseDelayMs * 2 ** (this.failureCount - 1);
    const hinted = Math.max(exponential, this.retryAfterMs ?? 0);
    return Math.min(hinted, this.config.maxDelayMs);
  }

  /**
   * True once the streak has grown the delay to `maxDelayMs`.
   */
  get saturated(): boolean {
    return this.failureCount > 0 && this.delayMs >= this.config.maxDelayMs;
  }

  /**
   * Part of the current delay not yet elapsed since the last failure.
   */
  remainingMs(now = Date.now()): number {
    if (this.lastFailureAt === null) {
      return 0;
    }
    return Math.max(0, this.delayMs - (now - this.lastFailureAt));
  }

  /**
   * Record a failed attempt.
   *
   * @param retryAfterMs - Server hint from a throttled response
   * @returns The delay the next attempt will wait
   */
  recordFailure(retryAfterMs?: number | null): number {
    this.failureCount++;
    this.retryAfterMs = retryAfterMs ?? null;
    this.lastFailureAt = Date.now();
    return this.delayMs;
  }

  /**
   * Clear the failure streak after a success.
   */
  reset(): void {
    this.failureCount = 0;
    this.retryAfterMs = null;
    this.lastFailureAt = null;
  }

  /**
   * Wait out what is left of the current delay.
   *
   * @throws AbortError if the signal fires first
   */
  async wait(signal?: AbortSignal): Promise<void> {
    await abortableSleep(this.remainingMs(), signal);
  }

  getState(): BackoffState {
    return {
      failures: this.failureCount,
      delayMs: this.delayMs,
      retryAfterMs: this.retryAfterMs,
    };
  }
}
