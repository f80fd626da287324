export { CacheLayer, type CacheLayerOptions, DEFAULT_CACHE_TTL_MS } from "./cache-layer.js";
export { cacheFileName, DiskCacheStore, type DiskCacheStoreOptions } from "./disk-store.js";
export { MemoryCacheStore } from "./memory-store.js";
export type {
  CacheEntry,
  CacheResolution,
  CacheSource,
  CacheStats,
  CacheStore,
  Fetcher,
  ResolveOptions,
} from "./types.js";
