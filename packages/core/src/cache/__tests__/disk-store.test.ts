import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { cacheFileName, DiskCacheStore } from "../disk-store.js";

const KEY = "https://example.test/api/projects/?page_size=50";

describe("DiskCacheStore", () => {
  let tempDir: string;
  let store: DiskCacheStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "fedora-l10n-cache-test-"));
    store = new DiskCacheStore({ dir: path.join(tempDir, "cache") });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("names files by a 16 character hash prefix", () => {
    const name = cacheFileName(KEY);
    expect(name).toMatch(/^[0-9a-f]{16}\.json$/);
    expect(cacheFileName(KEY)).toBe(name);
    expect(cacheFileName(`${KEY}&page=2`)).not.toBe(name);
  });

  it("round-trips an entry through a file", async () => {
    await store.set({ key: KEY, payload: { results: [{ slug: "anaconda" }] }, fetchedAt: 1000 });

    expect(await store.get(KEY)).toEqual({
      key: KEY,
      payload: { results: [{ slug: "anaconda" }] },
      fetchedAt: 1000,
    });
    const written = JSON.parse(
      fs.readFileSync(path.join(tempDir, "cache", cacheFileName(KEY)), "utf-8")
    );
    expect(written).toEqual({ key: KEY, fetchedAt: 1000, payload: { results: [{ slug: "anaconda" }] } });
  });

  it("reports a missing entry as undefined", async () => {
    expect(await store.get(KEY)).toBeUndefined();
  });

  it("treats corrupt files as a miss", async () => {
    fs.mkdirSync(path.join(tempDir, "cache"), { recursive: true });
    fs.writeFileSync(path.join(tempDir, "cache", cacheFileName(KEY)), "{not json");

    expect(await store.get(KEY)).toBeUndefined();
  });

  it("treats files of the wrong shape as a miss", async () => {
    fs.mkdirSync(path.join(tempDir, "cache"), { recursive: true });
    fs.writeFileSync(path.join(tempDir, "cache", cacheFileName(KEY)), JSON.stringify({ _ts: 1 }));

    expect(await store.get(KEY)).toBeUndefined();
  });

  it("lists readable entries and clears them", async () => {
    await store.set({ key: "a", payload: 1, fetchedAt: 1 });
    await store.set({ key: "b", payload: 2, fetchedAt: 2 });
    fs.writeFileSync(path.join(tempDir, "cache", "broken.json"), "");

    const keys = (await store.list()).map((entry) => entry.key).sort();
    expect(keys).toEqual(["a", "b"]);

    expect(await store.clear()).toBe(3);
    expect(await store.list()).toEqual([]);
  });

  it("clears a directory that does not exist yet", async () => {
    expect(await store.clear()).toBe(0);
  });

  it("does not throw when the directory cannot be written", async () => {
    const blocker = path.join(tempDir, "file");
    fs.writeFileSync(blocker, "");
    const blocked = new DiskCacheStore({ dir: path.join(blocker, "cache") });

    await expect(blocked.set({ key: KEY, payload: 1, fetchedAt: 1 })).resolves.toBeUndefined();
  });
});
