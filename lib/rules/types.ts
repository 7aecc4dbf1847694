// lib/rules/types.ts
import { z } from "zod";

export const ZPatternRule = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  // "g"/"y" make RegExp.test stateful, so they are not accepted here
  flags: z.string().regex(/^[imsu]*$/, "only i, m, s and u flags are allowed").optional(),
});

export const ZRuleSetConfig = z.object({
  version: z.string().min(1),
  target: z.object({
    country: z.string().min(1),
    region: z.string().min(1),
    timezone: z.string().min(1),
  }),
  visa_sponsorship: z.array(ZPatternRule),
  visa_sponsorship_negations: z.array(ZPatternRule).default([]),
  restriction: z.array(ZPatternRule),
  inclusion: z.array(ZPatternRule),
  remote_first_domains: z.array(z.string().min(1)).default([]),
});

export type PatternRule = z.infer<typeof ZPatternRule>;
export type RuleSetConfig = z.input<typeof ZRuleSetConfig>;
export type TargetLocation = z.infer<typeof ZRuleSetConfig>["target"];

export type CompiledRule = PatternRule & { regex: RegExp };

export type CompiledRuleSet = {
  version: string;
  target: TargetLocation;
  visaSponsorship: CompiledRule[];
  visaSponsorshipNegations: CompiledRule[];
  restriction: CompiledRule[];
  inclusion: CompiledRule[];
  remoteFirstDomains: string[];
};

/** What decided a rule-engine verdict; `kind` is the discriminant. */
export type RuleMatch =
  | { kind: "visa_sponsorship"; verdict: "visa_sponsorship"; ruleId: string; matched: string }
  | { kind: "restriction"; verdict: "not_helpful"; ruleId: string; matched: string }
  | { kind: "inclusion"; verdict: "helpful"; ruleId: string; matched: string }
  | { kind: "remote_board"; verdict: "helpful"; domain: string }
  | { kind: "unclear"; verdict: "unclear"; hint: "remote_unspecified" | "no_signal" };
