// lib/cache/memory.ts
import type { CacheEntry, CacheStats, CacheStore, CacheValue } from "./types";
import { emptyStats, isLive } from "./types";

/**
 * Process-local cache. Every operation finishes synchronously inside its promise,
 * so writes to the same key are atomic and the last one to run wins.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;

  constructor(opts: { now?: () => number } = {}) {
    this.now = opts.now ?? Date.now;
  }

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (!isLive(entry, this.now())) {
      this.entries.delete(key);
      return null;
    }
    return { ...entry };
  }

  async put(key: string, value: CacheValue, ttlMs: number): Promise<void> {
    const created = this.now();
    this.entries.set(key, {
      key,
      url: value.url,
      verdict: value.verdict,
      reason: value.reason,
      created_at: new Date(created).toISOString(),
      expires_at: new Date(created + ttlMs).toISOString(),
    });
  }

  async clearAll(): Promise<number> {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  async clearExpired(): Promise<number> {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!isLive(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async stats(): Promise<CacheStats> {
    const now = this.now();
    const stats = emptyStats();
    for (const entry of this.entries.values()) {
      stats.total_entries++;
      if (isLive(entry, now)) {
        stats.active_entries++;
        stats.verdicts[entry.verdict] = (stats.verdicts[entry.verdict] ?? 0) + 1;
      } else {
        stats.expired_entries++;
      }
    }
    return stats;
  }
}
