export { createJobChecker, createCacheStore } from "./service";
export type { JobChecker, JobCheckerOverrides } from "./service";
export { loadConfig } from "./config";
export type { AppConfig, CacheConfig } from "./config";
export { analyzeJob, buildJudgeContext, PIPELINE } from "./orchestrator/analyzeJob";
export type { AnalyzerDeps, PipelineStep, StepOutcome } from "./orchestrator/analyzeJob";
export { classify, match, describeMatch, compileRuleSet, getDefaultRuleSet } from "./rules/engine";
export type { RuleMatch, RuleSetConfig, CompiledRuleSet, TargetLocation } from "./rules/types";
export { MemoryCacheStore } from "./cache/memory";
export { SupabaseCacheStore } from "./cache/supabase";
export { normalizeJobUrl, cacheKeyFor } from "./cache/key";
export type { CacheEntry, CacheStats, CacheStore, CacheValue } from "./cache/types";
export { WebContentFetcher } from "./adapters/web";
export type { ContentFetcher, ScrapedContent } from "./adapters/types";
export { OpenAIJudge } from "./nlp/client";
export type { AIJudge, JudgeResponse } from "./nlp/types";
export { VERDICTS, EXHAUSTED_REASON, ContractError } from "./verdict/types";
export type { AnalysisResult, ResultSource, Verdict } from "./verdict/types";
export { VERDICT_EMOJIS, formatVerdictLabel, renderReply } from "./format";
export { extractUrls, isJobUrl, firstJobUrl, JOB_DOMAINS } from "./links";
