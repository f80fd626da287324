/**
 * HTTP Connection Pool Module
 *
 * Shared HTTP client utilities with connection pooling. Every Weblate request
 * goes through a single undici Agent so that paginated listings and the
 * per-component statistics calls reuse the same TLS connection.
 *
 * @module @fedora-l10n/shared/http
 */

import {
  Agent,
  type Dispatcher,
  type RequestInit as UndiciRequestInit,
  fetch as undiciFetch,
} from "undici";

/**
 * Configuration options for creating an HTTP connection pool.
 */
export interface HttpPoolOptions {
  /**
   * Maximum time a connection can remain idle before being closed (ms).
   * @default 30_000
   */
  keepAliveTimeout?: number;

  /**
   * Maximum time a connection can be kept alive (ms).
   * @default 60_000
   */
  keepAliveMaxTimeout?: number;

  /**
   * Maximum number of connections per origin.
   * @default 4
   */
  connections?: number;

  /**
   * Connection timeout (ms).
   * @default 10_000
   */
  connect?: {
    timeout?: number;
  };
}

/**
 * Default pool configuration. Requests are sequential, so a handful of
 * connections per origin is plenty.
 */
export const DEFAULT_POOL_OPTIONS: Required<Omit<HttpPoolOptions, "connect">> & {
  connect: { timeout: number };
} = {
  keepAliveTimeout: 30_000,
  keepAliveMaxTimeout: 60_000,
  connections: 4,
  connect: {
    timeout: 10_000,
  },
} as const;

/**
 * Creates a new HTTP connection pool with the specified options.
 *
 * @example
 * ```typescript
 * const pool = createHttpPool({ keepAliveTimeout: 15_000 });
 * const response = await fetchWithPool(url, { pool });
 * ```
 */
export function createHttpPool(options: HttpPoolOptions = {}): Agent {
  return new Agent({
    keepAliveTimeout: options.keepAliveTimeout ?? DEFAULT_POOL_OPTIONS.keepAliveTimeout,
    keepAliveMaxTimeout: options.keepAliveMaxTimeout ?? DEFAULT_POOL_OPTIONS.keepAliveMaxTimeout,
    connections: options.connections ?? DEFAULT_POOL_OPTIONS.connections,
    connect: {
      timeout: options.connect?.timeout ?? DEFAULT_POOL_OPTIONS.connect.timeout,
    },
  });
}

let defaultPool: Agent | null = null;

/**
 * Lazily created shared pool. Creating it on first use keeps commands that
 * never touch the network (cache, api-key) from opening an Agent.
 */
export function getDefaultHttpPool(): Agent {
  if (!defaultPool) {
    defaultPool = createHttpPool();
  }
  return defaultPool;
}

/**
 * Minimal view of an HTTP response. Both undici's and the global fetch
 * `Response` satisfy it, which lets tests hand in plain `Response` objects.
 */
export interface HttpResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  readonly headers: { get(name: string): string | null };
  text(): Promise<string>;
}

/**
 * Extended fetch options that include the dispatcher for connection pooling.
 */
export interface FetchWithPoolOptions extends Omit<UndiciRequestInit, "dispatcher"> {
  /**
   * Custom dispatcher to use instead of the default pool
   * (an undici `MockAgent` works here too).
   */
  pool?: Dispatcher;
}

/**
 * Fetch wrapper that routes the request through the connection pool.
 *
 * @example
 * ```typescript
 * const response = await fetchWithPool("https://translate.fedoraproject.org/api/projects/", {
 *   headers: { Accept: "application/json" },
 * });
 * ```
 */
export async function fetchWithPool(
  url: string | URL,
  options: FetchWithPoolOptions = {}
): Promise<HttpResponse> {
  const { pool, ...fetchOptions } = options;
  return undiciFetch(url, {
    ...fetchOptions,
    dispatcher: pool ?? getDefaultHttpPool(),
  });
}

/**
 * Gracefully closes the default HTTP pool, if one was created.
 */
export async function closeDefaultPool(): Promise<void> {
  if (defaultPool) {
    const pool = defaultPool;
    defaultPool = null;
    await pool.close();
  }
}

export type { Agent as HttpPool };
