import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { closeDefaultPool, fetchWithPool, getDefaultHttpPool } from "../pool.js";

describe("fetchWithPool", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
    await closeDefaultPool();
  });

  it("sends the request through the given dispatcher", async () => {
    agent
      .get("https://weblate.example.test")
      .intercept({ path: "/api/projects/", method: "GET" })
      .reply(200, { count: 0, next: null, results: [] }, { headers: { "x-ratelimit-remaining": "99" } });

    const response = await fetchWithPool("https://weblate.example.test/api/projects/", {
      headers: { Accept: "application/json" },
      pool: agent,
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("x-ratelimit-remaining")).toBe("99");
    expect(JSON.parse(await response.text())).toEqual({ count: 0, next: null, results: [] });
  });

  it("exposes error statuses without throwing", async () => {
    agent
      .get("https://weblate.example.test")
      .intercept({ path: "/api/projects/missing/" })
      .reply(404, "Not found");

    const response = await fetchWithPool("https://weblate.example.test/api/projects/missing/", {
      pool: agent,
    });

    expect(response.ok).toBe(false);
    expect(response.status).toBe(404);
  });
});

describe("default pool", () => {
  it("is created once and replaced after closing", async () => {
    const first = getDefaultHttpPool();
    expect(getDefaultHttpPool()).toBe(first);

    await closeDefaultPool();

    expect(getDefaultHttpPool()).not.toBe(first);
    await closeDefaultPool();
  });

  it("closes nothing when no pool was created", async () => {
    await expect(closeDefaultPool()).resolves.toBeUndefined();
  });
});
