// lib/rules/engine.ts
// Deterministic accessibility classifier: ordered regex tiers, first match wins.
//   1. visa sponsorship  -> visa_sponsorship
//   2. restriction       -> not_helpful
//   3. inclusion         -> helpful (also: posted on a remote-first board)
//   4. nothing           -> unclear

import defaultRules from "./default-rules.json";
import { assertNever, type Verdict } from "../verdict/types";
import { getErrorMessage } from "../safe";
import {
  ZRuleSetConfig,
  type CompiledRule,
  type CompiledRuleSet,
  type PatternRule,
  type RuleMatch,
  type RuleSetConfig,
} from "./types";

const compileRules = (group: string, rules: PatternRule[], errors: string[]): CompiledRule[] =>
  rules.map((rule) => {
    const flags = rule.flags?.includes("i") ? rule.flags : `${rule.flags ?? ""}i`;
    try {
      return { ...rule, regex: new RegExp(rule.pattern, flags) };
    } catch (error) {
      errors.push(`${group} rule "${rule.id}" invalid regex: ${getErrorMessage(error)}`);
      return { ...rule, regex: /$^/ };
    }
  });

/** Validates and compiles a rule set; throws listing every bad rule. */
export function compileRuleSet(config: RuleSetConfig): CompiledRuleSet {
  const parsed = ZRuleSetConfig.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid rule set: ${issues.join(" | ")}`);
  }

  const cfg = parsed.data;
  const errors: string[] = [];
  const compiled: CompiledRuleSet = {
    version: cfg.version,
    target: cfg.target,
    visaSponsorship: compileRules("visa_sponsorship", cfg.visa_sponsorship, errors),
    visaSponsorshipNegations: compileRules("visa_sponsorship_negations", cfg.visa_sponsorship_negations, errors),
    restriction: compileRules("restriction", cfg.restriction, errors),
    inclusion: compileRules("inclusion", cfg.inclusion, errors),
    remoteFirstDomains: cfg.remote_first_domains.map((d) => d.toLowerCase()),
  };

  if (errors.length > 0) {
    throw new Error(`Invalid rule set: ${errors.join(" | ")}`);
  }
  return compiled;
}

let defaultRuleSet: CompiledRuleSet | null = null;

export function getDefaultRuleSet(): CompiledRuleSet {
  defaultRuleSet ??= compileRuleSet(defaultRules);
  return defaultRuleSet;
}

/** Lower-case, NFKC, straight apostrophes, single spaces. */
export function normalizeForMatching(text: string): string {
  return (text ?? "")
    .normalize("NFKC")
    .replace(/[‘’]/g, "'")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

function firstMatch(rules: CompiledRule[], text: string): { rule: CompiledRule; matched: string } | null {
  for (const rule of rules) {
    const m = rule.regex.exec(text);
    if (m) return { rule, matched: m[0] };
  }
  return null;
}

type Span = { start: number; end: number; matched: string };

function spansOf(regex: RegExp, text: string): Span[] {
  const global = new RegExp(regex.source, regex.flags.includes("g") ? regex.flags : `${regex.flags}g`);
  const spans: Span[] = [];
  for (const m of text.matchAll(global)) {
    const start = m.index ?? 0;
    if (m[0]) spans.push({ start, end: start + m[0].length, matched: m[0] });
  }
  return spans;
}

const SENTENCE_END = /[.!?;]/;

/** Bounds of the sentence holding [start, end). */
function sentenceAround(text: string, start: number, end: number): { start: number; end: number } {
  let from = start;
  while (from > 0 && !SENTENCE_END.test(text.charAt(from - 1))) from--;
  let to = end;
  while (to < text.length && !SENTENCE_END.test(text.charAt(to))) to++;
  return { start: from, end: to };
}

// a negation only cancels the sponsorship phrase it overlaps, within the same sentence
function isNegated(span: Span, text: string, negations: CompiledRule[]): boolean {
  const sentence = sentenceAround(text, span.start, span.end);
  const clause = text.slice(sentence.start, sentence.end);
  return negations.some((rule) =>
    spansOf(rule.regex, clause).some(
      (n) => sentence.start + n.start < span.end && sentence.start + n.end > span.start
    )
  );
}

function firstSponsorship(rules: CompiledRuleSet, text: string): { rule: CompiledRule; matched: string } | null {
  for (const rule of rules.visaSponsorship) {
    for (const span of spansOf(rule.regex, text)) {
      if (!isNegated(span, text, rules.visaSponsorshipNegations)) return { rule, matched: span.matched };
    }
  }
  return null;
}

function remoteBoardOf(url: string, domains: string[]): string | null {
  if (!url) return null;
  let host: string;
  try {
    host = new URL(url.trim()).hostname.toLowerCase().replace(/\.$/, "");
  } catch {
    return null;
  }
  return domains.find((d) => host === d || host.endsWith(`.${d}`)) ?? null;
}

/** Detailed classification: which tier and which rule decided. */
export function match(text: string, url: string, rules: CompiledRuleSet = getDefaultRuleSet()): RuleMatch {
  const haystack = normalizeForMatching(text);

  const visa = firstSponsorship(rules, haystack);
  if (visa) {
    return { kind: "visa_sponsorship", verdict: "visa_sponsorship", ruleId: visa.rule.id, matched: visa.matched };
  }

  // before inclusion: "Remote (US only)" must not read as open to everyone
  const restriction = firstMatch(rules.restriction, haystack);
  if (restriction) {
    return { kind: "restriction", verdict: "not_helpful", ruleId: restriction.rule.id, matched: restriction.matched };
  }

  const inclusion = firstMatch(rules.inclusion, haystack);
  if (inclusion) {
    return { kind: "inclusion", verdict: "helpful", ruleId: inclusion.rule.id, matched: inclusion.matched };
  }

  const board = remoteBoardOf(url, rules.remoteFirstDomains);
  if (board) {
    return { kind: "remote_board", verdict: "helpful", domain: board };
  }

  // bare "remote" usually means US-remote
  const hint = /\bremote\b/.test(haystack) ? "remote_unspecified" : "no_signal";
  return { kind: "unclear", verdict: "unclear", hint };
}

export function classify(text: string, url: string, rules?: CompiledRuleSet): Verdict {
  return match(text, url, rules).verdict;
}

export function describeMatch(result: RuleMatch): string {
  switch (result.kind) {
    case "visa_sponsorship":
      return `Offers visa sponsorship: '${result.matched}'`;
    case "restriction":
      return `Location restricted: '${result.matched}'`;
    case "inclusion":
      return `Accessible: '${result.matched}'`;
    case "remote_board":
      return `Posted on worldwide remote job board (${result.domain})`;
    case "unclear":
      return result.hint === "remote_unspecified"
        ? "Mentions 'remote' but location requirements unclear"
        : "Cannot determine location requirements from text";
    default:
      return assertNever(result);
  }
}
