/**
 * Service Bootstrap
 *
 * Wires the configured services together once per process: the cache
 * layer over a disk or memory store, the shared backoff and throttle, the
 * API key resolver and the Weblate client on top of them.
 */

import { closeDefaultPool } from "@fedora-l10n/shared";
import { CacheLayer } from "../cache/cache-layer.js";
import { DiskCacheStore } from "../cache/disk-store.js";
import { MemoryCacheStore } from "../cache/memory-store.js";
import type { CacheStore } from "../cache/types.js";
import { getApiKeyFilePath } from "../config/paths.js";
import type { Config } from "../config/schema.js";
import { type ApiKeyResolver, createApiKeyResolver } from "../credentials/resolver.js";
import { ErrorHandler } from "../errors/handler.js";
import type { Logger } from "../logger/logger.js";
import { silentLogger } from "../logger/logger.js";
import { Backoff } from "../rate-limit/backoff.js";
import { RequestThrottle } from "../rate-limit/throttle.js";
import { WeblateClient } from "../weblate/client.js";
import { type FetchLike, WeblateTransport } from "../weblate/transport.js";

export interface BootstrapOptions {
  config: Config;
  logger?: Logger;
  /** Replaces the pooled undici fetch */
  fetch?: FetchLike;
  /** Environment searched for API keys */
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  /** Overrides the API key file location */
  keyFile?: string;
  /** Serve expired cache entries when Weblate cannot be reached */
  staleOnError?: boolean;
  onStale?: (url: string, error: unknown) => void;
  userAgent?: string;
}

export interface Services {
  readonly config: Config;
  readonly logger: Logger;
  readonly errorHandler: ErrorHandler;
  readonly apiKeys: ApiKeyResolver;
  readonly cache: CacheLayer;
  readonly client: WeblateClient;
}

/**
 * Build every service from a loaded configuration.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * if (!config.ok) throw new Error(config.error.message);
 *
 * const services = bootstrap({ config: config.value, logger });
 * const projects = await services.client.listProjects();
 * await shutdown(services);
 * ```
 */
export function bootstrap(options: BootstrapOptions): Services {
  const { config } = options;
  const logger = options.logger ?? silentLogger;

  // A disabled cache never touches the disk
  const store: CacheStore = config.cache.enabled
    ? new DiskCacheStore({ dir: config.cache.dir, logger: logger.child({ component: "cache" }) })
    : new MemoryCacheStore();

  const cache = new CacheLayer({
    store,
    ttlMs: config.cache.ttlMs,
    backoff: new Backoff(config.backoff),
    enabled: config.cache.enabled,
    logger: logger.child({ component: "cache" }),
  });

  const apiKeys = createApiKeyResolver({
    keyFile: options.keyFile ?? getApiKeyFilePath({ env: options.env, homeDir: options.homeDir }),
    env: options.env,
    logger,
  });

  const transport = new WeblateTransport({
    fetch: options.fetch,
    apiKey: async () => (await apiKeys.resolve())?.value ?? null,
    timeoutMs: config.api.timeoutMs,
    throttle: new RequestThrottle({ minIntervalMs: config.api.minIntervalMs }),
    userAgent: options.userAgent,
    logger: logger.child({ component: "transport" }),
  });

  const client = new WeblateClient({
    baseUrl: config.api.baseUrl,
    language: config.language,
    cache,
    transport,
    maxRetries: config.api.maxRetries,
    pageSize: config.api.pageSize,
    staleOnError: options.staleOnError,
    onStale: options.onStale,
    logger: logger.child({ component: "weblate" }),
  });

  return {
    config,
    logger,
    errorHandler: new ErrorHandler({ logger }),
    apiKeys,
    cache,
    client,
  };
}

/**
 * Flush logs, stop their timers and close pooled connections. Safe to call
 * more than once.
 */
export async function shutdown(services?: Services): Promise<void> {
  if (services) {
    await services.logger.flush();
    services.logger.dispose();
  }
  await closeDefaultPool();
}
