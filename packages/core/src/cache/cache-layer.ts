// ============================================================================
// Cache Layer
// ============================================================================

import { isAbortError } from "../errors/retry.js";
import { ErrorCode, isRetryableError, L10nError } from "../errors/types.js";
import type { Logger } from "../logger/logger.js";
import { silentLogger } from "../logger/logger.js";
import { Backoff } from "../rate-limit/backoff.js";
import type {
  CacheEntry,
  CacheResolution,
  CacheStats,
  CacheStore,
  Fetcher,
  ResolveOptions,
} from "./types.js";

/** One hour */
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

export interface CacheLayerOptions {
  store: CacheStore;
  /** Validity window of an entry in milliseconds (default: 1 hour) */
  ttlMs?: number;
  /** Shared backoff; one is created with default settings when omitted */
  backoff?: Backoff;
  /** When false, lookups always miss and nothing is stored */
  enabled?: boolean;
  logger?: Logger;
}

/**
 * Serves responses from a store while they are younger than the TTL and
 * fetches otherwise, waiting out the backoff delay before each fetch.
 *
 * A failed fetch is never stored. It is rethrown, unless `staleOnError`
 * finds an expired entry to serve. Only retryable failures (429, 5xx,
 * timeouts, network errors) bump the backoff, honoring the error's retry
 * hint; a definite answer such as a 404 leaves it alone. A successful
 * fetch resets the backoff.
 *
 * Once the backoff sits at its ceiling, requests inside the remaining
 * window fail at once (or serve stale data) without fetching.
 *
 * @example
 * ```typescript
 * const cache = new CacheLayer({ store: new DiskCacheStore({ dir }), ttlMs: 3_600_000 });
 *
 * const payload = await cache.getOrFetch(url, (signal) => transport.getJson(url, signal));
 * ```
 */
export class CacheLayer {
  readonly ttlMs: number;
  private readonly store: CacheStore;
  private readonly backoff: Backoff;
  private readonly enabled: boolean;
  private readonly logger: Logger;
  private lastFailure: unknown;

  constructor(options: CacheLayerOptions) {
    this.store = options.store;
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.backoff = options.backoff ?? new Backoff();
    this.enabled = options.enabled ?? true;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * True while the backoff is saturated and its window has not elapsed.
   */
  get coolingDown(): boolean {
    return this.backoff.saturated && this.backoff.remainingMs() > 0;
  }

  /**
   * Return the cached payload for `key` if still valid, otherwise fetch,
   * store and return it.
   */
  async getOrFetch(key: string, fetcher: Fetcher, options: ResolveOptions = {}): Promise<unknown> {
    const resolution = await this.resolve(key, fetcher, options);
    return resolution.value;
  }

  /**
   * Like {@link getOrFetch}, reporting where the value came from.
   */
  async resolve(key: string, fetcher: Fetcher, options: ResolveOptions = {}): Promise<CacheResolution> {
    const cached = this.enabled ? await this.store.get(key) : undefined;

    if (cached && !options.forceRefresh && this.isValid(cached)) {
      this.logger.debug("Cache hit", { key });
      return { value: cached.payload, source: "cache", fetchedAt: cached.fetchedAt };
    }

    if (this.coolingDown) {
      const error = this.unavailable(key);
      this.logger.debug("Skipped fetch while backing off", { key, remainingMs: this.backoff.remainingMs() });
      if (options.staleOnError && cached) {
        return { value: cached.payload, source: "stale", fetchedAt: cached.fetchedAt, error };
      }
      throw error;
    }

    try {
      await this.backoff.wait(options.signal);
      const payload = await fetcher(options.signal);
      this.backoff.reset();
      this.lastFailure = undefined;

      const entry: CacheEntry = { key, payload, fetchedAt: Date.now() };
      if (this.enabled) {
        await this.store.set(entry);
      }
      this.logger.debug("Fetched", { key });
      return { value: payload, source: "network", fetchedAt: entry.fetchedAt };
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      if (isRetryableError(error)) {
        const hint = error instanceof L10nError ? error.retryDelay : undefined;
        const delayMs = this.backoff.recordFailure(hint);
        this.lastFailure = error;
        this.logger.warn("Fetch failed", {
          key,
          failures: this.backoff.failures,
          nextDelayMs: delayMs,
          error: message,
        });
      } else {
        this.logger.warn("Fetch failed", { key, error: message });
      }

      if (options.staleOnError && cached) {
        return { value: cached.payload, source: "stale", fetchedAt: cached.fetchedAt, error };
      }
      throw error;
    }
  }

  private unavailable(key: string): L10nError {
    const seconds = Math.ceil(this.backoff.remainingMs() / 1000);
    const reason = this.lastFailure instanceof Error ? `: ${this.lastFailure.message}` : "";
    return new L10nError(
      `Weblate unavailable, next attempt in ${seconds}s${reason}`,
      ErrorCode.API_NETWORK_ERROR,
      { cause: this.lastFailure, context: { key, failures: this.backoff.failures } }
    );
  }

  /**
   * An entry is valid while `now - fetchedAt < ttl`.
   */
  isValid(entry: CacheEntry, now = Date.now()): boolean {
    return now - entry.fetchedAt < this.ttlMs;
  }

  async clear(): Promise<number> {
    return this.store.clear();
  }

  async stats(): Promise<CacheStats> {
    const entries = await this.store.list();
    const now = Date.now();
    return {
      total: entries.length,
      valid: entries.filter((entry) => this.isValid(entry, now)).length,
      failures: this.backoff.failures,
      backoffMs: this.backoff.delayMs,
    };
  }
}
