// lib/cache/key.ts
import crypto from "node:crypto";
import { ContractError } from "../verdict/types";

// Query params that only track where a click came from; they never change the posting.
const TRACKING_PARAMS = new Set([
  "gh_src",
  "ref",
  "referrer",
  "source",
  "src",
  "fbclid",
  "gclid",
  "mc_cid",
  "mc_eid",
  "lever-source",
  "lever-origin",
  "trk",
  "trackingid",
  "refid",
]);

function isTrackingParam(name: string): boolean {
  const k = name.toLowerCase();
  return k.startsWith("utm_") || TRACKING_PARAMS.has(k);
}

const compare = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Canonical form of a job URL used for cache keys:
 * lower-cased scheme/host/path, no fragment, no trailing slash,
 * tracking params dropped and the rest sorted.
 */
export function normalizeJobUrl(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  if (!trimmed) throw new ContractError("A job URL is required");

  let u: URL;
  try {
    u = new URL(trimmed);
  } catch {
    throw new ContractError(`Not a valid URL: ${trimmed}`);
  }

  const params = Array.from(u.searchParams.entries())
    .filter(([k]) => !isTrackingParam(k))
    .sort(([a, av], [b, bv]) => (a === b ? compare(av, bv) : compare(a, b)));
  const query = new URLSearchParams(params).toString();

  const path = u.pathname.toLowerCase().replace(/\/+$/, "");
  // u.host keeps a non-default port; URL already lower-cases scheme and host
  return `${u.protocol}//${u.host}${path}${query ? `?${query}` : ""}`;
}

export function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input, "utf8").digest("hex");
}

export function cacheKeyFor(rawUrl: string): string {
  return sha256Hex(normalizeJobUrl(rawUrl));
}
