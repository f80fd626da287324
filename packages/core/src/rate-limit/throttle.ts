// ============================================
// Request Throttle
// ============================================

import { abortableSleep } from "../errors/retry.js";
import { DEFAULT_THROTTLE_CONFIG, type ThrottleConfig } from "./types.js";

/**
 * Spaces network dispatches at least `minIntervalMs` apart.
 *
 * Callers reserve the next free slot synchronously, so concurrent callers
 * queue up in call order rather than all firing once the interval passes.
 */
export class RequestThrottle {
  private readonly minIntervalMs: number;
  private nextSlot = 0;

  constructor(config: Partial<ThrottleConfig> = {}) {
    this.minIntervalMs = config.minIntervalMs ?? DEFAULT_THROTTLE_CONFIG.minIntervalMs;
  }

  /**
   * Milliseconds a caller arriving now would wait.
   */
  getWaitTime(now = Date.now()): number {
    return Math.max(0, this.nextSlot - now);
  }

  /**
   * Wait for a dispatch slot.
   *
   * @throws AbortError if the signal fires while waiting; the slot is released
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;

    try {
      await abortableSleep(slot - now, signal);
    } catch (error) {
      if (this.nextSlot === slot + this.minIntervalMs) {
        this.nextSlot = slot;
      }
      throw error;
    }
  }
}
