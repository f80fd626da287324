import type { CacheEntry, CacheStore } from "./types.js";

/**
 * In-process store, used when the disk cache is disabled and in tests.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.key, entry);
  }

  async list(): Promise<CacheEntry[]> {
    return [...this.entries.values()];
  }

  async clear(): Promise<number> {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }
}
