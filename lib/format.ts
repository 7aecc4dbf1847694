// lib/format.ts
import type { AnalysisResult, Verdict } from "./verdict/types";

export const VERDICT_EMOJIS: Record<Verdict, string> = {
  helpful: "✅",
  not_helpful: "❌",
  visa_sponsorship: "🌍",
  unclear: "❓",
};

// "visa_sponsorship" -> "Visa Sponsorship"
export function formatVerdictLabel(verdict: Verdict): string {
  return verdict
    .split("_")
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

/** Markdown reply for the chat layer. */
export function renderReply(result: AnalysisResult): string {
  const reason = result.source === "cache" ? `${result.reason} (cached)` : result.reason;
  return `${VERDICT_EMOJIS[result.verdict]} **${formatVerdictLabel(result.verdict)}**\n\n${reason}`;
}
