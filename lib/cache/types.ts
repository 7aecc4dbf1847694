// lib/cache/types.ts
import type { Verdict } from "../verdict/types";

export type CacheEntry = {
  key: string;        // sha256 of the normalized URL
  url: string;        // normalized URL, kept for debugging
  verdict: Verdict;
  reason: string;
  created_at: string; // ISO
  expires_at: string; // ISO, always created_at + ttl
};

export type CacheValue = Pick<CacheEntry, "url" | "verdict" | "reason">;

export type CacheStats = {
  total_entries: number;
  active_entries: number;
  expired_entries: number;
  verdicts: Partial<Record<Verdict, number>>;
};

/**
 * Time-bounded verdict store shared by every analysis.
 * Implementations fail open: read errors look like misses, write errors are logged and dropped.
 */
export interface CacheStore {
  /** Entry for `key`, or null when missing or expired (now >= expires_at). */
  get(key: string): Promise<CacheEntry | null>;
  /** Inserts or fully replaces the entry for `key`. */
  put(key: string, value: CacheValue, ttlMs: number): Promise<void>;
  /** Removes every entry regardless of TTL; returns how many were removed. */
  clearAll(): Promise<number>;
  clearExpired(): Promise<number>;
  stats(): Promise<CacheStats>;
}

export const HOUR_MS = 60 * 60 * 1000;
export const DEFAULT_CACHE_TTL_MS = 24 * HOUR_MS;

export function emptyStats(): CacheStats {
  return { total_entries: 0, active_entries: 0, expired_entries: 0, verdicts: {} };
}

export function isLive(entry: Pick<CacheEntry, "expires_at">, nowMs: number): boolean {
  return nowMs < new Date(entry.expires_at).getTime();
}
