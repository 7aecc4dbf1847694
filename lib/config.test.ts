import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("fills in defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      ai: { apiKey: undefined, model: "gpt-4o-mini", timeoutMs: 30_000 },
      cache: { backend: "memory", ttlMs: 86_400_000, cacheUnclear: false },
      scrape: { timeoutMs: 10_000, retries: 1 },
    });
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ OPENAI_API_KEY: "  ", CACHE_TTL_HOURS: "" }).ai.apiKey).toBeUndefined();
    expect(loadConfig({ CACHE_TTL_HOURS: "" }).cache.ttlMs).toBe(86_400_000);
  });

  it("parses numbers and flags", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-key",
      CACHE_TTL_HOURS: "0.5",
      CACHE_UNCLEAR: "TRUE",
      SCRAPE_RETRIES: "0",
    });

    expect(config.ai.apiKey).toBe("test-key");
    expect(config.cache).toEqual({ backend: "memory", ttlMs: 1_800_000, cacheUnclear: true });
    expect(config.scrape.retries).toBe(0);
  });

  it("builds the supabase cache settings", () => {
    expect(
      loadConfig({
        CACHE_BACKEND: "supabase",
        SUPABASE_URL: "http://localhost:54321",
        SUPABASE_SERVICE_ROLE_KEY: "test-service-key",
      }).cache
    ).toEqual({
      backend: "supabase",
      ttlMs: 86_400_000,
      cacheUnclear: false,
      url: "http://localhost:54321",
      serviceRoleKey: "test-service-key",
      table: "job_verdicts",
    });
  });

  it("lists every missing supabase setting", () => {
    expect(() => loadConfig({ CACHE_BACKEND: "supabase" })).toThrow(
      [
        "Invalid configuration:",
        "  - SUPABASE_URL: required when CACHE_BACKEND=supabase",
        "  - SUPABASE_SERVICE_ROLE_KEY: required when CACHE_BACKEND=supabase",
      ].join("\n")
    );
  });

  it("rejects a non-numeric TTL", () => {
    expect(() => loadConfig({ CACHE_TTL_HOURS: "soon" })).toThrow(
      "Invalid configuration:\n  - CACHE_TTL_HOURS: Expected number, received nan"
    );
  });

  it("rejects an unknown cache backend", () => {
    expect(() => loadConfig({ CACHE_BACKEND: "redis" })).toThrow(/CACHE_BACKEND/);
  });
});
