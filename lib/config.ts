// lib/config.ts
// Typed settings from the environment. Entry points load .env with dotenv first.

import { z } from "zod";
import { DEFAULT_CACHE_TTL_MS, HOUR_MS } from "./cache/types";

const FLAGS = ["true", "false", "1", "0", "yes", "no"] as const;

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(FLAGS))
  .default("false")
  .transform((v) => v === "true" || v === "1" || v === "yes");

const ZEnv = z
  .object({
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
    AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    CACHE_BACKEND: z.enum(["memory", "supabase"]).default("memory"),
    CACHE_TTL_HOURS: z.coerce.number().positive().default(DEFAULT_CACHE_TTL_MS / HOUR_MS),
    CACHE_UNCLEAR: flag,
    CACHE_TABLE: z.string().regex(/^[a-z_][a-z0-9_]*$/, "must be a plain table name").default("job_verdicts"),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),

    SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    SCRAPE_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
  })
  .superRefine((env, ctx) => {
    if (env.CACHE_BACKEND !== "supabase") return;
    if (!env.SUPABASE_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["SUPABASE_URL"], message: "required when CACHE_BACKEND=supabase" });
    }
    if (!env.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SUPABASE_SERVICE_ROLE_KEY"],
        message: "required when CACHE_BACKEND=supabase",
      });
    }
  });

export type CacheConfig =
  | { backend: "memory"; ttlMs: number; cacheUnclear: boolean }
  | { backend: "supabase"; ttlMs: number; cacheUnclear: boolean; url: string; serviceRoleKey: string; table: string };

export type AppConfig = {
  ai: { apiKey?: string; model: string; timeoutMs: number };
  cache: CacheConfig;
  scrape: { timeoutMs: number; retries: number };
};

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // "" in a .env file means "not set"
  const present = Object.fromEntries(
    Object.entries(env)
      .map(([k, v]) => [k, v?.trim()] as const)
      .filter(([, v]) => v !== undefined && v !== "")
  );
  const parsed = ZEnv.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration:\n${issues.join("\n")}`);
  }
  const e = parsed.data;

  const ttlMs = Math.round(e.CACHE_TTL_HOURS * HOUR_MS);
  const cache: CacheConfig =
    e.CACHE_BACKEND === "supabase" && e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
      ? {
          backend: "supabase",
          ttlMs,
          cacheUnclear: e.CACHE_UNCLEAR,
          url: e.SUPABASE_URL,
          serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
          table: e.CACHE_TABLE,
        }
      : { backend: "memory", ttlMs, cacheUnclear: e.CACHE_UNCLEAR };

  return {
    ai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL, timeoutMs: e.AI_TIMEOUT_MS },
    cache,
    scrape: { timeoutMs: e.SCRAPE_TIMEOUT_MS, retries: e.SCRAPE_RETRIES },
  };
}
