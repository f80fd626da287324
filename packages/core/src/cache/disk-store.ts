// ============================================================================
// Disk Cache Store
// ============================================================================

import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import type { Logger } from "../logger/logger.js";
import { silentLogger } from "../logger/logger.js";
import type { CacheEntry, CacheStore } from "./types.js";

const ENTRY_SUFFIX = ".json";

const StoredEntrySchema = z.object({
  key: z.string(),
  fetchedAt: z.number(),
  payload: z.unknown(),
});

export interface DiskCacheStoreOptions {
  /** Directory holding one JSON file per entry */
  dir: string;
  logger?: Logger;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * File name for a key: the first 16 hex characters of its SHA-256.
 *
 * @example
 * ```typescript
 * cacheFileName("https://translate.fedoraproject.org/api/projects/?page_size=50");
 * // => "<16 hex chars>.json"
 * ```
 */
export function cacheFileName(key: string): string {
  return `${createHash("sha256").update(key).digest("hex").slice(0, 16)}${ENTRY_SUFFIX}`;
}

/**
 * Stores each entry as `{ key, fetchedAt, payload }` in its own file.
 *
 * Missing, unreadable or corrupt files read as a miss. Write failures are
 * logged and swallowed so a read-only cache directory never breaks a fetch.
 */
export class DiskCacheStore implements CacheStore {
  readonly dir: string;
  private readonly logger: Logger;

  constructor(options: DiskCacheStoreOptions) {
    this.dir = options.dir;
    this.logger = options.logger ?? silentLogger;
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const entry = await this.readFile(path.join(this.dir, cacheFileName(key)));
    // Different key behind the same hash prefix
    if (entry && entry.key !== key) {
      return undefined;
    }
    return entry;
  }

  async set(entry: CacheEntry): Promise<void> {
    const filePath = path.join(this.dir, cacheFileName(entry.key));
    const tempPath = `${filePath}.tmp`;

    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(
        tempPath,
        JSON.stringify({ key: entry.key, fetchedAt: entry.fetchedAt, payload: entry.payload }),
        "utf-8"
      );
      await fs.rename(tempPath, filePath);
    } catch (error) {
      this.logger.warn("Failed to write cache entry", {
        key: entry.key,
        path: filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async list(): Promise<CacheEntry[]> {
    const files = await this.entryFiles();
    const entries: CacheEntry[] = [];
    for (const file of files) {
      const entry = await this.readFile(path.join(this.dir, file));
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  async clear(): Promise<number> {
    const files = await this.entryFiles();
    let removed = 0;
    for (const file of files) {
      try {
        await fs.unlink(path.join(this.dir, file));
        removed++;
      } catch (error) {
        if (!isNodeError(error) || error.code !== "ENOENT") {
          throw error;
        }
      }
    }
    this.logger.debug("Cache cleared", { dir: this.dir, removed });
    return removed;
  }

  private async entryFiles(): Promise<string[]> {
    try {
      const names = await fs.readdir(this.dir);
      return names.filter((name) => name.endsWith(ENTRY_SUFFIX));
    } catch (error) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }
  }

  private async readFile(filePath: string): Promise<CacheEntry | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (!isNodeError(error) || error.code !== "ENOENT") {
        this.logger.debug("Unreadable cache entry", { path: filePath });
      }
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.debug("Corrupt cache entry", { path: filePath });
      return undefined;
    }

    const result = StoredEntrySchema.safeParse(parsed);
    if (!result.success) {
      this.logger.debug("Cache entry has unexpected shape", { path: filePath });
      return undefined;
    }
    return {
      key: result.data.key,
      fetchedAt: result.data.fetchedAt,
      payload: result.data.payload,
    };
  }
}
