// lib/nlp/client.ts

// AI fallback for postings the rules can't place: one Responses API call with a strict JSON schema,
// validated with zod and mapped onto the four verdicts. No retries here; callers retry on a later call.

import OpenAI from "openai";
import { z } from "zod";
import type { AIJudge, JudgeResponse } from "./types";
import type { TargetLocation } from "../rules/types";
import { getDefaultRuleSet } from "../rules/engine";
import { VERDICTS, type Verdict } from "../verdict/types";
import { getErrorMessage } from "../safe";

export const MAX_CONTEXT_CHARS = 8_000;

// Only what we send; the real client's params are a superset of this.
export type JudgeRequest = {
  model: string;
  temperature: number;
  input: Array<{ role: "system" | "user"; content: string }>;
  text: {
    format: {
      type: "json_schema";
      name: string;
      schema: Record<string, unknown>;
      strict: boolean;
    };
  };
};

/** The slice of the OpenAI client the judge needs. */
export interface ResponsesClient {
  responses: {
    create(body: JudgeRequest): PromiseLike<{ output_text: string }>;
  };
}

const ZJudgeOutput = z.object({
  verdict: z.string(),
  reason: z.string(),
});

const schema = {
  type: "object",
  additionalProperties: false,
  properties: {
    verdict: { type: "string", enum: [...VERDICTS] },
    reason: { type: "string" },
  },
  required: ["verdict", "reason"],
};

/** Lenient label mapping: "VISA SPONSORSHIP", "not-helpful", "Helpful" ... anything else is unclear. */
export function toVerdict(label: string): Verdict {
  const l = label.trim().toUpperCase().replace(/[\s-]+/g, "_");
  if (l.includes("VISA")) return "visa_sponsorship";
  if (l.includes("NOT_HELPFUL") || l === "NOT") return "not_helpful";
  if (l.includes("HELPFUL")) return "helpful";
  return "unclear";
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined; // not JSON; callers fall back to the line format
  }
}

/**
 * Reads the model output: the JSON object we asked for, or the older
 * "VERDICT: ...\nREASON: ..." line format. Null when neither is there.
 */
export function parseJudgeOutput(raw: string): { verdict: Verdict; reason: string } | null {
  const text = raw.trim();
  if (!text) return null;

  const json = tryParseJson(text);
  if (json !== undefined) {
    const parsed = ZJudgeOutput.safeParse(json);
    if (!parsed.success) return null;
    return {
      verdict: toVerdict(parsed.data.verdict),
      reason: parsed.data.reason.trim() || "Analysis completed",
    };
  }

  let verdictLine = "";
  let reasonLine = "";
  for (const line of text.split("\n")) {
    const l = line.trim();
    if (/^verdict:/i.test(l)) verdictLine = l.replace(/^verdict:/i, "").trim();
    else if (/^reason:/i.test(l)) reasonLine = l.replace(/^reason:/i, "").trim();
  }
  if (!verdictLine) return null;
  return { verdict: toVerdict(verdictLine), reason: reasonLine || "Analysis completed" };
}

export function truncateContext(context: string, max = MAX_CONTEXT_CHARS): string {
  return context.length > max ? `${context.slice(0, max)}...[truncated]` : context;
}

export function buildJudgePrompt(target: TargetLocation, context: string): { system: string; user: string } {
  const system = [
    `You decide whether someone living in ${target.country} (${target.region}, ${target.timezone}) can apply to a job posting.`,
    "Return ONLY valid JSON matching the provided schema.",
    "Verdicts:",
    `- helpful: open to ${target.country} residents (worldwide remote, ${target.region} or Africa included, or based in ${target.country}).`,
    "- visa_sponsorship: the employer offers visa sponsorship or relocation support, even if the role is location-restricted.",
    `- not_helpful: restricted to locations that exclude ${target.country} and no sponsorship is offered.`,
    "- unclear: the text does not say enough to decide.",
    "Guidelines:",
    "- 'Remote' on its own often means remote within the US; do not treat it as worldwide.",
    `- Timezone requirements matter: ${target.timezone} is the candidate's timezone.`,
    "- Look at work authorization, H-1B, work permits, immigration support and relocation packages.",
    "- If sponsorship or relocation assistance is mentioned, choose visa_sponsorship even when there are location restrictions.",
    "- reason: one sentence.",
  ].join("\n");

  const user = ["Job details:", truncateContext(context)].join("\n");
  return { system, user };
}

export type OpenAIJudgeOptions = {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  target?: TargetLocation;
  client?: ResponsesClient; // tests pass a stand-in
};

export class OpenAIJudge implements AIJudge {
  private readonly client: ResponsesClient | null;
  private readonly model: string;
  private readonly target: TargetLocation;

  constructor(opts: OpenAIJudgeOptions = {}) {
    this.model = opts.model ?? "gpt-4o-mini";
    this.target = opts.target ?? getDefaultRuleSet().target;
    this.client =
      opts.client ??
      (opts.apiKey
        ? new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs ?? 30_000, maxRetries: 0 })
        : null);
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async judge(context: string): Promise<JudgeResponse> {
    if (!this.client) {
      console.warn("[OpenAIJudge] No API key configured");
      return { status: "unavailable", reason: "AI analysis unavailable (no API key)" };
    }

    const { system, user } = buildJudgePrompt(this.target, context);
    try {
      const resp = await this.client.responses.create({
        model: this.model,
        temperature: 0.2,
        input: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
        text: {
          format: { type: "json_schema", name: "job_verdict", schema, strict: true },
        },
      });

      const parsed = parseJudgeOutput(resp.output_text);
      if (!parsed) {
        console.error("[OpenAIJudge] Could not parse model output");
        return { status: "unavailable", reason: "Could not parse AI analysis" };
      }

      console.log(`[OpenAIJudge] ${parsed.verdict} - ${parsed.reason.slice(0, 50)}`);
      return { status: "ok", ...parsed };
    } catch (err) {
      console.error("[OpenAIJudge] API error:", getErrorMessage(err));
      return { status: "unavailable", reason: `AI analysis failed: ${getErrorMessage(err).slice(0, 50)}` };
    }
  }
}
