// ============================================================================
// Cache Types
// ============================================================================

/**
 * One stored API response.
 */
export interface CacheEntry {
  /** Request key, the endpoint URL */
  readonly key: string;
  /** Parsed JSON body exactly as received */
  readonly payload: unknown;
  /** Epoch milliseconds of the successful fetch */
  readonly fetchedAt: number;
}

/**
 * Key-value persistence behind the cache layer.
 *
 * Stores never throw on read: unreadable entries are reported as missing.
 */
export interface CacheStore {
  get(key: string): Promise<CacheEntry | undefined>;
  set(entry: CacheEntry): Promise<void>;
  /** All readable entries */
  list(): Promise<CacheEntry[]>;
  /** Remove every entry; returns how many were removed */
  clear(): Promise<number>;
}

/**
 * Where a resolved value came from.
 * - cache: a valid entry, no network call
 * - network: freshly fetched and stored
 * - stale: the fetch failed and an expired entry was served instead
 */
export type CacheSource = "cache" | "network" | "stale";

export interface CacheResolution {
  readonly value: unknown;
  readonly source: CacheSource;
  readonly fetchedAt: number;
  /** The fetch failure behind a stale value */
  readonly error?: unknown;
}

/**
 * Produces a fresh payload. Receives the caller's abort signal.
 */
export type Fetcher = (signal?: AbortSignal) => Promise<unknown>;

export interface ResolveOptions {
  /** Skip the lookup; the fetched value is still stored */
  readonly forceRefresh?: boolean;
  /** Serve an expired entry when the fetch fails */
  readonly staleOnError?: boolean;
  readonly signal?: AbortSignal;
}

export interface CacheStats {
  /** Entries currently stored */
  readonly total: number;
  /** Entries still inside the TTL window */
  readonly valid: number;
  /** Consecutive fetch failures */
  readonly failures: number;
  /** Delay the next fetch will wait */
  readonly backoffMs: number;
}
