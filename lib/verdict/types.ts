// lib/verdict/types.ts

export const VERDICTS = ["helpful", "visa_sponsorship", "not_helpful", "unclear"] as const;

/** Accessibility of a job posting for someone based in the target location. */
export type Verdict = (typeof VERDICTS)[number];

export type ResultSource = "rule" | "ai" | "cache" | "error";

export type AnalysisResult = Readonly<{
  verdict: Verdict;
  reason: string; // never empty
  source: ResultSource;
}>;

export const EXHAUSTED_REASON = "Cannot determine requirements";

export function makeResult(verdict: Verdict, reason: string, source: ResultSource): AnalysisResult {
  const trimmed = reason.trim();
  return Object.freeze({
    verdict,
    reason: trimmed || EXHAUSTED_REASON,
    source,
  });
}

export function exhaustedResult(): AnalysisResult {
  return makeResult("unclear", EXHAUSTED_REASON, "error");
}

/** Thrown only for caller bugs (e.g. an empty URL). Everything else degrades to a verdict. */
export class ContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractError";
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
