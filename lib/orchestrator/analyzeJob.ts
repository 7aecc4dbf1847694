// Main orchestrator: cache -> rules on caller text -> scrape + rules -> AI judge.
// Each step either resolves the analysis or passes to the next one.

import type { CacheStore } from "../cache/types";
import { cacheKeyFor, normalizeJobUrl } from "../cache/key";
import type { ContentFetcher, ScrapedContent } from "../adapters/types";
import { failedScrape } from "../adapters/types";
import type { AIJudge } from "../nlp/types";
import type { CompiledRuleSet } from "../rules/types";
import { describeMatch, getDefaultRuleSet, match } from "../rules/engine";
import {
  ContractError,
  exhaustedResult,
  makeResult,
  type AnalysisResult,
} from "../verdict/types";
import { safe } from "../safe";

export type AnalyzerDeps = {
  cache: CacheStore;
  fetcher: ContentFetcher;
  judge: AIJudge;
  rules?: CompiledRuleSet;
  cacheTtlMs: number;
  /** Also cache rule/AI results that came back unclear (exhaustion results never are). */
  cacheUnclear?: boolean;
};

type PipelineState = {
  callerText: string;
  url: string;           // as given by the caller (trimmed)
  normalizedUrl: string;
  key: string;
  scraped: ScrapedContent | null;
};

export type StepOutcome =
  | { kind: "resolved"; result: AnalysisResult; cacheable: boolean }
  | { kind: "continue" };

export type PipelineStep = {
  name: string;
  run(state: PipelineState, deps: AnalyzerDeps): Promise<StepOutcome>;
};

const CONTINUE: StepOutcome = { kind: "continue" };

const resolved = (result: AnalysisResult, cacheable = true): StepOutcome => ({
  kind: "resolved",
  result,
  cacheable,
});

// 1. Cached verdict, as-is (no TTL refresh, no rewrite)
const cacheStep: PipelineStep = {
  name: "cache",
  async run(state, deps) {
    const hit = await safe(() => deps.cache.get(state.key));
    if (!hit.success) {
      console.error("[analyzeJob] Cache read failed, treating as miss:", hit.errorMessage);
      return CONTINUE;
    }
    if (!hit.data) {
      console.log(`[analyzeJob] Cache MISS for ${state.normalizedUrl}`);
      return CONTINUE;
    }
    console.log(`[analyzeJob] Cache HIT for ${state.normalizedUrl}`);
    return resolved(makeResult(hit.data.verdict, hit.data.reason, "cache"), false);
  },
};

// 2. Rules over whatever text the caller sent along with the link
const callerTextStep: PipelineStep = {
  name: "rules:caller-text",
  async run(state, deps) {
    const m = match(state.callerText, state.url, deps.rules ?? getDefaultRuleSet());
    if (m.verdict === "unclear") return CONTINUE;
    return resolved(makeResult(m.verdict, describeMatch(m), "rule"));
  },
};

// 3. Scrape the page and run the same rules over it
const scrapedTextStep: PipelineStep = {
  name: "rules:scraped",
  async run(state, deps) {
    const fetched = await safe(() => deps.fetcher.fetch(state.url));
    if (!fetched.success) {
      console.error(`[analyzeJob] Fetcher threw for ${state.url}, treating as scrape failure:`, fetched.errorMessage);
    }
    state.scraped = fetched.success ? fetched.data : failedScrape();

    if (!state.scraped.scrape_success) {
      console.log(`[analyzeJob] Scrape failed for ${state.url}, continuing with text only`);
      return CONTINUE;
    }

    const m = match(state.scraped.raw_text, state.url, deps.rules ?? getDefaultRuleSet());
    if (m.verdict === "unclear") return CONTINUE;
    return resolved(makeResult(m.verdict, `${describeMatch(m)} (from scraped content)`, "rule"));
  },
};

// 4. AI judge over scraped text + caller text
const aiStep: PipelineStep = {
  name: "ai",
  async run(state, deps) {
    if (!deps.judge.isAvailable()) {
      console.log("[analyzeJob] AI judge unavailable, skipping");
      return CONTINUE;
    }

    const context = buildJudgeContext(state.callerText, state.scraped);
    const answer = await safe(() => deps.judge.judge(context));
    if (!answer.success) {
      console.error("[analyzeJob] AI judge threw:", answer.errorMessage);
      return CONTINUE;
    }
    if (answer.data.status === "unavailable") {
      console.warn(`[analyzeJob] AI judge unavailable: ${answer.data.reason}`);
      return CONTINUE;
    }

    // an "unclear" from the judge is still its answer; whether it gets cached is up to cacheUnclear
    return resolved(makeResult(answer.data.verdict, `${answer.data.reason} (AI analysis)`, "ai"));
  },
};

export const PIPELINE: readonly PipelineStep[] = [cacheStep, callerTextStep, scrapedTextStep, aiStep];

/** Fetched text first (when the scrape worked), then the caller's text. */
export function buildJudgeContext(callerText: string, scraped: ScrapedContent | null): string {
  const parts: string[] = [];
  if (scraped?.scrape_success && scraped.raw_text.trim()) parts.push(scraped.raw_text.trim());
  if (callerText.trim()) parts.push(callerText.trim());
  return parts.join("\n\n");
}

/**
 * Analyze a job URL for accessibility from the target location.
 * Always answers with a verdict; only caller bugs (empty/invalid URL) throw.
 */
export async function analyzeJob(
  callerText: string,
  url: string,
  deps: AnalyzerDeps,
  steps: readonly PipelineStep[] = PIPELINE
): Promise<AnalysisResult> {
  if (typeof url !== "string" || !url.trim()) {
    throw new ContractError("analyzeJob requires a non-empty URL");
  }

  const trimmedUrl = url.trim();
  const normalizedUrl = normalizeJobUrl(trimmedUrl); // throws ContractError on unparsable URLs
  const state: PipelineState = {
    callerText: typeof callerText === "string" ? callerText : "",
    url: trimmedUrl,
    normalizedUrl,
    key: cacheKeyFor(trimmedUrl),
    scraped: null,
  };

  for (const step of steps) {
    const outcome = await safe(() => step.run(state, deps));

    if (!outcome.success) {
      console.error(`[analyzeJob] Step "${step.name}" failed:`, outcome.errorMessage);
      return exhaustedResult();
    }
    if (outcome.data.kind === "continue") continue;

    const { result, cacheable } = outcome.data;
    const keep = cacheable && (result.verdict !== "unclear" || Boolean(deps.cacheUnclear));
    if (keep) {
      const write = await safe(() =>
        deps.cache.put(state.key, { url: normalizedUrl, verdict: result.verdict, reason: result.reason }, deps.cacheTtlMs)
      );
      if (!write.success) console.error("[analyzeJob] Cache write failed:", write.errorMessage);
    }

    console.log(`[analyzeJob] ${step.name} -> ${result.verdict}: ${result.reason}`);
    return result;
  }

  // nothing decided; never cached so a later call can still succeed
  console.log(`[analyzeJob] No step could decide for ${normalizedUrl}`);
  return exhaustedResult();
}
