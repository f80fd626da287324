/**
 * API Key Resolver
 *
 * Consults stores in priority order (env > file) and remembers the answer.
 *
 * @module credentials/resolver
 */

import type { Logger } from "../logger/logger.js";
import { silentLogger } from "../logger/logger.js";
import { Err, Ok, type Result } from "../types/result.js";
import { EnvApiKeyStore } from "./stores/env-store.js";
import { FileApiKeyStore } from "./stores/file-store.js";
import { type ApiKey, type ApiKeyStore, type ApiKeyStoreError, createStoreError } from "./types.js";

export interface ApiKeyResolverOptions {
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const resolver = createApiKeyResolver({ keyFile: getApiKeyFilePath() });
 * const key = await resolver.resolve();
 * const headers = key ? { Authorization: `Token ${key.value}` } : {};
 * ```
 */
export class ApiKeyResolver {
  private readonly stores: ApiKeyStore[];
  private readonly logger: Logger;
  /** undefined until the first lookup; null caches "no key" */
  private cached: ApiKey | null | undefined;

  constructor(stores: ApiKeyStore[], options: ApiKeyResolverOptions = {}) {
    this.stores = [...stores].sort((a, b) => b.priority - a.priority);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * First key found across the stores, or null. A store that fails is
   * logged and skipped.
   */
  async resolve(): Promise<ApiKey | null> {
    if (this.cached !== undefined) {
      return this.cached;
    }

    for (const store of this.stores) {
      const result = await store.get();
      if (!result.ok) {
        this.logger.warn("API key store failed", {
          store: store.name,
          error: result.error.message,
        });
        continue;
      }
      if (result.value) {
        this.logger.debug("API key resolved", {
          source: result.value.source,
          hint: result.value.maskedHint,
        });
        this.cached = result.value;
        return result.value;
      }
    }

    this.cached = null;
    return null;
  }

  async has(): Promise<boolean> {
    return (await this.resolve()) !== null;
  }

  /**
   * Save to the highest-priority writable store and drop the cached answer.
   */
  async save(value: string): Promise<Result<ApiKey, ApiKeyStoreError>> {
    const store = this.stores.find((candidate) => !candidate.readOnly);
    if (!store) {
      return Err(createStoreError("READ_ONLY", "No writable API key store configured", "env"));
    }
    const result = await store.set(value);
    this.invalidate();
    return result;
  }

  /**
   * Remove the key from every writable store.
   */
  async remove(): Promise<Result<boolean, ApiKeyStoreError>> {
    let removed = false;
    for (const store of this.stores) {
      if (store.readOnly) continue;
      const result = await store.delete();
      if (!result.ok) {
        return result;
      }
      removed = removed || result.value;
    }
    this.invalidate();
    return Ok(removed);
  }

  invalidate(): void {
    this.cached = undefined;
  }
}

export interface CreateApiKeyResolverOptions extends ApiKeyResolverOptions {
  keyFile: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolver over the environment and the key file.
 */
export function createApiKeyResolver(options: CreateApiKeyResolverOptions): ApiKeyResolver {
  return new ApiKeyResolver(
    [new EnvApiKeyStore(options.env), new FileApiKeyStore(options.keyFile)],
    { logger: options.logger }
  );
}
