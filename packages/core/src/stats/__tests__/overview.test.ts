import { afterEach, describe, expect, it, vi } from "vitest";
import { CacheLayer } from "../../cache/cache-layer.js";
import { MemoryCacheStore } from "../../cache/memory-store.js";
import { AbortError } from "../../errors/retry.js";
import { Backoff } from "../../rate-limit/backoff.js";
import { RequestThrottle } from "../../rate-limit/throttle.js";
import { WeblateClient } from "../../weblate/client.js";
import { type FetchLike, WeblateTransport } from "../../weblate/transport.js";
import { loadProjectOverview, sortOverview } from "../overview.js";
import type { OverviewProgress } from "../types.js";

const BASE = "https://weblate.example.test/api";

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200 });
}

const routes: Record<string, () => Response> = {
  [`${BASE}/projects/?page_size=50`]: () =>
    json({
      count: 3,
      next: null,
      results: [
        { slug: "dnf", name: "DNF" },
        { slug: "anaconda", name: "Anaconda" },
        { slug: "broken", name: "Broken" },
      ],
    }),
  [`${BASE}/projects/dnf/statistics/sv/`]: () => json({ translated_percent: 40 }),
  [`${BASE}/projects/anaconda/statistics/sv/`]: () => json({ translated_percent: 95 }),
  [`${BASE}/projects/broken/statistics/sv/`]: () => new Response("oops", { status: 400, statusText: "Bad Request" }),
};

function createClient(fetch: FetchLike): WeblateClient {
  return new WeblateClient({
    baseUrl: BASE,
    language: "sv",
    cache: new CacheLayer({
      store: new MemoryCacheStore(),
      backoff: new Backoff({ baseDelayMs: 0, maxDelayMs: 0 }),
    }),
    transport: new WeblateTransport({ fetch, throttle: new RequestThrottle({ minIntervalMs: 0 }) }),
  });
}

describe("loadProjectOverview", () => {
  it("returns every project sorted by completion with failures at zero", async () => {
    const fetch = vi.fn<FetchLike>(async (url) => routes[url]?.() ?? new Response("", { status: 404 }));
    const progress: OverviewProgress[] = [];

    const entries = await loadProjectOverview(createClient(fetch), {
      onProgress: (p) => progress.push(p),
    });

    expect(entries).toEqual([
      { slug: "anaconda", name: "Anaconda", translatedPct: 95 },
      { slug: "dnf", name: "DNF", translatedPct: 40 },
      {
        slug: "broken",
        name: "Broken",
        translatedPct: 0,
        error: "Weblate request failed (HTTP 400 Bad Request)",
      },
    ]);
    expect(progress).toEqual([
      { phase: "projects", page: 1, totalPages: 1 },
      { phase: "statistics", done: 1, total: 3 },
      { phase: "statistics", done: 2, total: 3 },
      { phase: "statistics", done: 3, total: 3 },
    ]);
  });

  it("stops on abort", async () => {
    const controller = new AbortController();
    const fetch = vi.fn<FetchLike>(async (url) => {
      if (url.includes("/statistics/")) {
        controller.abort();
      }
      return routes[url]?.() ?? new Response("", { status: 404 });
    });

    await expect(
      loadProjectOverview(createClient(fetch), { signal: controller.signal })
    ).rejects.toBeInstanceOf(AbortError);
  });
});

describe("loadProjectOverview while Weblate is unreachable", () => {
  const T0 = new Date("2024-05-01T10:00:00Z").getTime();
  const slugs = Array.from({ length: 20 }, (_, i) => `p${String(i + 1).padStart(2, "0")}`);

  afterEach(() => {
    vi.useRealTimers();
  });

  it("falls back to errors within a minute on default settings", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    const fetch = vi.fn<FetchLike>(async (url) => {
      if (url === `${BASE}/projects/?page_size=50`) {
        return json({ count: 20, next: null, results: slugs.map((slug) => ({ slug, name: slug })) });
      }
      const cause = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
      throw new TypeError("fetch failed", { cause });
    });
    const client = new WeblateClient({
      baseUrl: BASE,
      language: "sv",
      cache: new CacheLayer({ store: new MemoryCacheStore(), backoff: new Backoff() }),
      transport: new WeblateTransport({ fetch, throttle: new RequestThrottle() }),
    });

    const pending = loadProjectOverview(client);
    await vi.runAllTimersAsync();
    const entries = await pending;

    expect(Date.now() - T0).toBeLessThan(60_000);
    // listing, five attempts for p01, then one each for p02 and p03
    expect(fetch).toHaveBeenCalledTimes(8);
    expect(entries).toHaveLength(20);
    expect(entries.every((entry) => entry.translatedPct === 0)).toBe(true);
    expect(entries[0]).toEqual({
      slug: "p01",
      name: "p01",
      translatedPct: 0,
      error: "Connection refused by the server",
    });
    expect(entries[19]).toEqual({
      slug: "p20",
      name: "p20",
      translatedPct: 0,
      error: "Weblate unavailable, next attempt in 30s: Connection refused by the server",
    });
  });
});

describe("sortOverview", () => {
  it("breaks ties by name", () => {
    const sorted = sortOverview([
      { slug: "b", name: "Beta", translatedPct: 50 },
      { slug: "a", name: "Alpha", translatedPct: 50 },
      { slug: "c", name: "Gamma", translatedPct: 70 },
    ]);

    expect(sorted.map((e) => e.slug)).toEqual(["c", "a", "b"]);
  });
});
