// lib/nlp/types.ts
import type { Verdict } from "../verdict/types";

export type JudgeResponse =
  | { status: "ok"; verdict: Verdict; reason: string }
  | { status: "unavailable"; reason: string };

/**
 * Natural-language fallback used only when the rules are inconclusive.
 * Must bound its own wait and report "unavailable" instead of hanging.
 */
export interface AIJudge {
  isAvailable(): boolean;
  judge(context: string): Promise<JudgeResponse>;
}
