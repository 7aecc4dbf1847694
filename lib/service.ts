// lib/service.ts
// Caller surface: wire the collaborators once at startup, then analyze/clear.

import type { AppConfig } from "./config";
import type { CacheStats, CacheStore } from "./cache/types";
import { MemoryCacheStore } from "./cache/memory";
import { SupabaseCacheStore } from "./cache/supabase";
import { getAdminClient } from "./db/client";
import type { ContentFetcher } from "./adapters/types";
import { WebContentFetcher } from "./adapters/web";
import type { AIJudge } from "./nlp/types";
import { OpenAIJudge } from "./nlp/client";
import type { CompiledRuleSet } from "./rules/types";
import { getDefaultRuleSet } from "./rules/engine";
import { analyzeJob } from "./orchestrator/analyzeJob";
import type { AnalysisResult } from "./verdict/types";

export type JobChecker = {
  analyze(callerText: string, url: string): Promise<AnalysisResult>;
  clearCache(): Promise<number>;
  clearExpired(): Promise<number>;
  cacheStats(): Promise<CacheStats>;
};

export type JobCheckerOverrides = Partial<{
  cache: CacheStore;
  fetcher: ContentFetcher;
  judge: AIJudge;
  rules: CompiledRuleSet;
}>;

export function createCacheStore(config: AppConfig["cache"]): CacheStore {
  if (config.backend === "supabase") {
    const supabase = getAdminClient({ url: config.url, serviceRoleKey: config.serviceRoleKey });
    return new SupabaseCacheStore(supabase, { table: config.table });
  }
  return new MemoryCacheStore();
}

export function createJobChecker(config: AppConfig, overrides: JobCheckerOverrides = {}): JobChecker {
  const rules = overrides.rules ?? getDefaultRuleSet();
  const cache = overrides.cache ?? createCacheStore(config.cache);
  const fetcher =
    overrides.fetcher ??
    new WebContentFetcher({ timeoutMs: config.scrape.timeoutMs, retries: config.scrape.retries });
  const judge =
    overrides.judge ??
    new OpenAIJudge({
      apiKey: config.ai.apiKey,
      model: config.ai.model,
      timeoutMs: config.ai.timeoutMs,
      target: rules.target,
    });

  const deps = {
    cache,
    fetcher,
    judge,
    rules,
    cacheTtlMs: config.cache.ttlMs,
    cacheUnclear: config.cache.cacheUnclear,
  };

  return {
    analyze: (callerText, url) => analyzeJob(callerText, url, deps),
    async clearCache() {
      const removed = await cache.clearAll();
      console.log(`[JobChecker] Cleared all ${removed} cache entries`);
      return removed;
    },
    async clearExpired() {
      const removed = await cache.clearExpired();
      if (removed > 0) console.log(`[JobChecker] Cleared ${removed} expired cache entries`);
      return removed;
    },
    cacheStats: () => cache.stats(),
  };
}
