import { beforeEach, describe, expect, it, vi } from "vitest";
import { createCacheStore, createJobChecker } from "./service";
import { loadConfig } from "./config";
import { MemoryCacheStore } from "./cache/memory";
import { SupabaseCacheStore } from "./cache/supabase";
import { FakeFetcher, FakeJudge, scraped } from "./testing/fakes";

const URL_1 = "https://boards.greenhouse.io/acme/jobs/1";

describe("createCacheStore", () => {
  it("picks the backend from config", () => {
    expect(createCacheStore(loadConfig({}).cache)).toBeInstanceOf(MemoryCacheStore);
    const supabase = loadConfig({
      CACHE_BACKEND: "supabase",
      SUPABASE_URL: "http://localhost:54321",
      SUPABASE_SERVICE_ROLE_KEY: "test-service-key",
    }).cache;
    expect(createCacheStore(supabase)).toBeInstanceOf(SupabaseCacheStore);
  });
});

describe("createJobChecker", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  it("analyzes, caches and clears", async () => {
    const fetcher = new FakeFetcher(scraped("Remote - EMEA"));
    const checker = createJobChecker(loadConfig({}), { fetcher, judge: new FakeJudge(false) });

    expect(await checker.analyze("", URL_1)).toEqual({
      verdict: "helpful",
      reason: "Accessible: 'emea' (from scraped content)",
      source: "rule",
    });
    expect((await checker.analyze("", URL_1)).source).toBe("cache");
    expect(await checker.cacheStats()).toEqual({
      total_entries: 1,
      active_entries: 1,
      expired_entries: 0,
      verdicts: { helpful: 1 },
    });

    expect(await checker.clearCache()).toBe(1);
    expect(console.log).toHaveBeenCalledWith("[JobChecker] Cleared all 1 cache entries");
    expect(await checker.clearCache()).toBe(0);

    expect((await checker.analyze("", URL_1)).source).toBe("rule");
    expect(fetcher.calls).toEqual([URL_1, URL_1]);
  });

  it("clearExpired leaves live entries alone", async () => {
    const checker = createJobChecker(loadConfig({}), { fetcher: new FakeFetcher(), judge: new FakeJudge(false) });
    await checker.analyze("worldwide remote", URL_1);

    expect(await checker.clearExpired()).toBe(0);
    expect((await checker.cacheStats()).active_entries).toBe(1);
  });
});
