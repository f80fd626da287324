import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FetchError } from "../../errors/fetch.js";
import { AbortError } from "../../errors/retry.js";
import { Backoff } from "../../rate-limit/backoff.js";
import { CacheLayer } from "../cache-layer.js";
import { MemoryCacheStore } from "../memory-store.js";

const ENDPOINT = "https://example.test/api/projects/?page_size=50";
const HOUR = 60 * 60 * 1000;
const T0 = new Date("2024-05-01T10:00:00Z").getTime();

describe("CacheLayer", () => {
  let store: MemoryCacheStore;
  let cache: CacheLayer;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    store = new MemoryCacheStore();
    cache = new CacheLayer({
      store,
      ttlMs: HOUR,
      backoff: new Backoff({ baseDelayMs: 100, maxDelayMs: 400 }),
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("TTL", () => {
    it("serves an entry younger than the TTL without fetching again", async () => {
      const fetcher = vi.fn().mockResolvedValue({ count: 1 });

      await cache.getOrFetch(ENDPOINT, fetcher);
      vi.setSystemTime(T0 + HOUR - 1);
      const second = await cache.resolve(ENDPOINT, fetcher);

      expect(fetcher).toHaveBeenCalledTimes(1);
      expect(second).toEqual({ value: { count: 1 }, source: "cache", fetchedAt: T0 });
    });

    it("refetches exactly once after the entry expires", async () => {
      const fetcher = vi
        .fn()
        .mockResolvedValueOnce({ count: 1 })
        .mockResolvedValueOnce({ count: 2 });

      await cache.getOrFetch(ENDPOINT, fetcher);
      vi.setSystemTime(T0 + HOUR);
      const refreshed = await cache.resolve(ENDPOINT, fetcher);
      const again = await cache.resolve(ENDPOINT, fetcher);

      expect(fetcher).toHaveBeenCalledTimes(2);
      expect(refreshed).toEqual({ value: { count: 2 }, source: "network", fetchedAt: T0 + HOUR });
      expect(again.source).toBe("cache");
      expect(again.value).toEqual({ count: 2 });
    });

    it("fetches anyway on forceRefresh and stores the result", async () => {
      const fetcher = vi
        .fn()
        .mockResolvedValueOnce("old")
        .mockResolvedValueOnce("new");

      await cache.getOrFetch(ENDPOINT, fetcher);
      const forced = await cache.resolve(ENDPOINT, fetcher, { forceRefresh: true });

      expect(forced.source).toBe("network");
      expect(await cache.getOrFetch(ENDPOINT, fetcher)).toBe("new");
      expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it("keys entries separately", async () => {
      const fetcher = vi.fn().mockImplementation(async () => "payload");

      await cache.getOrFetch(ENDPOINT, fetcher);
      await cache.getOrFetch(`${ENDPOINT}&page=2`, fetcher);

      expect(fetcher).toHaveBeenCalledTimes(2);
      expect((await cache.stats()).total).toBe(2);
    });
  });

  describe("failures", () => {
    it("does not cache a failed fetch and propagates the error", async () => {
      const error = FetchError.fromStatus(ENDPOINT, 500, "Internal Server Error");
      const fetcher = vi.fn().mockRejectedValue(error);

      await expect(cache.getOrFetch(ENDPOINT, fetcher)).rejects.toBe(error);
      expect(await store.get(ENDPOINT)).toBeUndefined();
    });

    it("doubles the backoff per failure up to the ceiling and resets on success", async () => {
      const error = FetchError.fromStatus(ENDPOINT, 503, "Service Unavailable");
      const fetcher = vi.fn().mockRejectedValue(error);

      await expect(cache.getOrFetch(ENDPOINT, fetcher)).rejects.toBe(error);
      expect((await cache.stats()).backoffMs).toBe(100);

      const second = expect(cache.getOrFetch(ENDPOINT, fetcher)).rejects.toBe(error);
      await vi.advanceTimersByTimeAsync(99);
      expect(fetcher).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      await second;
      expect(fetcher).toHaveBeenCalledTimes(2);
      expect((await cache.stats()).backoffMs).toBe(200);

      const third = expect(cache.getOrFetch(ENDPOINT, fetcher)).rejects.toBe(error);
      await vi.advanceTimersByTimeAsync(200);
      await third;
      expect((await cache.stats()).backoffMs).toBe(400);

      expect(cache.coolingDown).toBe(true);
      await vi.advanceTimersByTimeAsync(400);
      expect(cache.coolingDown).toBe(false);

      fetcher.mockResolvedValueOnce({ ok: true });
      expect(await cache.getOrFetch(ENDPOINT, fetcher)).toEqual({ ok: true });
      expect(fetcher).toHaveBeenCalledTimes(4);

      const stats = await cache.stats();
      expect(stats.backoffMs).toBe(0);
      expect(stats.failures).toBe(0);
    });

    it("fails at once without fetching while the backoff sits at its ceiling", async () => {
      const error = FetchError.fromStatus(ENDPOINT, 503, "Service Unavailable");
      const fetcher = vi.fn().mockRejectedValue(error);
      for (const delay of [0, 100, 200]) {
        const attempt = expect(cache.getOrFetch(ENDPOINT, fetcher)).rejects.toBe(error);
        await vi.advanceTimersByTimeAsync(delay);
        await attempt;
      }
      fetcher.mockClear();

      await expect(cache.getOrFetch("https://example.test/api/other/", fetcher)).rejects.toThrow(
        "Weblate unavailable, next attempt in 1s: Weblate request failed (HTTP 503 Service Unavailable)"
      );

      expect(fetcher).not.toHaveBeenCalled();
      expect((await cache.stats()).failures).toBe(3);
    });

    it("serves an expired entry at once while the backoff sits at its ceiling", async () => {
      await cache.getOrFetch(ENDPOINT, async () => ["cached"]);
      vi.setSystemTime(T0 + 2 * HOUR);
      const fetcher = vi.fn().mockRejectedValue(FetchError.fromStatus(ENDPOINT, 502, "Bad Gateway"));
      for (const delay of [0, 100, 200]) {
        const attempt = expect(cache.getOrFetch(ENDPOINT, fetcher)).rejects.toBeInstanceOf(FetchError);
        await vi.advanceTimersByTimeAsync(delay);
        await attempt;
      }

      const result = await cache.resolve(ENDPOINT, fetcher, { staleOnError: true });

      expect(result).toMatchObject({ value: ["cached"], source: "stale", fetchedAt: T0 });
      expect(fetcher).toHaveBeenCalledTimes(3);
    });

    it("leaves the backoff alone on a definite answer such as a 404", async () => {
      const fetcher = vi
        .fn()
        .mockRejectedValue(FetchError.fromStatus(ENDPOINT, 404, "Not Found"));

      for (let i = 0; i < 5; i++) {
        await expect(cache.getOrFetch(`${ENDPOINT}&page=${i}`, fetcher)).rejects.toMatchObject({
          status: 404,
        });
      }

      expect(fetcher).toHaveBeenCalledTimes(5);
      expect(Date.now()).toBe(T0);
      expect(await cache.stats()).toMatchObject({ failures: 0, backoffMs: 0 });
    });

    it("raises the delay to a Retry-After hint", async () => {
      const fetcher = vi.fn().mockRejectedValue(FetchError.fromStatus(ENDPOINT, 429, "", 300));

      await expect(cache.getOrFetch(ENDPOINT, fetcher)).rejects.toBeInstanceOf(FetchError);

      expect((await cache.stats()).backoffMs).toBe(300);
    });

    it("serves an expired entry when asked to and the fetch fails", async () => {
      await cache.getOrFetch(ENDPOINT, async () => ["cached"]);
      vi.setSystemTime(T0 + 2 * HOUR);
      const error = FetchError.fromStatus(ENDPOINT, 502, "Bad Gateway");

      const result = await cache.resolve(ENDPOINT, () => Promise.reject(error), { staleOnError: true });

      expect(result).toEqual({ value: ["cached"], source: "stale", fetchedAt: T0, error });
    });

    it("propagates the error when there is nothing stale to serve", async () => {
      const error = FetchError.fromStatus(ENDPOINT, 502, "Bad Gateway");

      await expect(
        cache.resolve(ENDPOINT, () => Promise.reject(error), { staleOnError: true })
      ).rejects.toBe(error);
    });

    it("does not count an abort as a failure", async () => {
      await expect(
        cache.getOrFetch(ENDPOINT, () => Promise.reject(new AbortError()))
      ).rejects.toBeInstanceOf(AbortError);

      expect((await cache.stats()).failures).toBe(0);
    });

    it("aborts a pending backoff wait", async () => {
      const fetcher = vi.fn().mockRejectedValue(FetchError.fromStatus(ENDPOINT, 503));
      await expect(cache.getOrFetch(ENDPOINT, fetcher)).rejects.toBeInstanceOf(FetchError);
      const controller = new AbortController();

      const pending = cache.getOrFetch(ENDPOINT, fetcher, { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(AbortError);
      expect(fetcher).toHaveBeenCalledTimes(1);
    });
  });

  describe("maintenance", () => {
    it("counts valid and total entries", async () => {
      await cache.getOrFetch("a", async () => 1);
      vi.setSystemTime(T0 + HOUR + 1);
      await cache.getOrFetch("b", async () => 2);

      expect(await cache.stats()).toEqual({ total: 2, valid: 1, failures: 0, backoffMs: 0 });
    });

    it("clears every entry", async () => {
      await cache.getOrFetch("a", async () => 1);
      await cache.getOrFetch("b", async () => 2);

      expect(await cache.clear()).toBe(2);
      expect((await cache.stats()).total).toBe(0);
    });

    it("neither reads nor writes when disabled", async () => {
      const disabled = new CacheLayer({ store, enabled: false });
      const fetcher = vi.fn().mockResolvedValue("x");

      await disabled.getOrFetch(ENDPOINT, fetcher);
      await disabled.getOrFetch(ENDPOINT, fetcher);

      expect(fetcher).toHaveBeenCalledTimes(2);
      expect(await store.list()).toEqual([]);
    });
  });
});
