// lib/cache/supabase.ts
//Persistent verdict cache on a Supabase (PostgREST) table, see db/job_verdicts.sql.
//Every method fails open: caching is best-effort and must never block an analysis.

import { z } from 'zod';
import type { SupabaseClient } from '@supabase/supabase-js';
import { VERDICTS } from '../verdict/types';
import { getErrorMessage } from '../safe';
import type { CacheEntry, CacheStats, CacheStore, CacheValue } from './types';
import { emptyStats, isLive } from './types';

const COLUMNS = 'key, url, verdict, reason, created_at, expires_at';

// timestamptz comes back as "2026-01-01T00:00:00+00:00"; keep everything as ISO-Z internally
const ZTimestamp = z.string().refine((s) => Number.isFinite(Date.parse(s)), 'invalid timestamp')
  .transform((s) => new Date(s).toISOString());

const ZCacheRow = z.object({
  key: z.string(),
  url: z.string(),
  verdict: z.enum(VERDICTS),
  reason: z.string().min(1),
  created_at: ZTimestamp,
  expires_at: ZTimestamp,
});

const ZStatsRow = z.object({
  verdict: z.enum(VERDICTS),
  expires_at: ZTimestamp,
});

export class SupabaseCacheStore implements CacheStore {
  private readonly table: string;
  private readonly now: () => number;

  constructor(
    private readonly supabase: SupabaseClient,
    opts: { table?: string; now?: () => number } = {}
  ) {
    this.table = opts.table ?? 'job_verdicts';
    this.now = opts.now ?? Date.now;
  }

  async get(key: string): Promise<CacheEntry | null> {
    try {
      const { data, error } = await this.supabase
        .from(this.table)
        .select(COLUMNS)
        .eq('key', key)
        .limit(1);

      if (error) throw new Error(error.message);

      const row: unknown = data?.[0];
      if (!row) return null;

      const parsed = ZCacheRow.safeParse(row);
      if (!parsed.success) {
        console.warn(`[SupabaseCacheStore.get] Ignoring malformed row for ${key}`);
        return null;
      }
      //expired rows stay until clearExpired; they just never count as hits
      return isLive(parsed.data, this.now()) ? parsed.data : null;
    } catch (err) {
      console.error('[SupabaseCacheStore.get] Read failed, treating as miss:', getErrorMessage(err));
      return null;
    }
  }

  async put(key: string, value: CacheValue, ttlMs: number): Promise<void> {
    const created = this.now();
    const row: CacheEntry = {
      key,
      url: value.url,
      verdict: value.verdict,
      reason: value.reason,
      created_at: new Date(created).toISOString(),
      expires_at: new Date(created + ttlMs).toISOString(),
    };

    try {
      //full replace on conflict; concurrent writers resolve last-writer-wins in Postgres
      const { error } = await this.supabase
        .from(this.table)
        .upsert([row], { onConflict: 'key', ignoreDuplicates: false });

      if (error) throw new Error(error.message);
    } catch (err) {
      console.error('[SupabaseCacheStore.put] Write failed, result not cached:', getErrorMessage(err));
    }
  }

  async clearAll(): Promise<number> {
    try {
      //PostgREST rejects an unfiltered DELETE, so match every real key
      const { count, error } = await this.supabase
        .from(this.table)
        .delete({ count: 'exact' })
        .neq('key', '');

      if (error) throw new Error(error.message);
      return count ?? 0;
    } catch (err) {
      console.error('[SupabaseCacheStore.clearAll] Delete failed:', getErrorMessage(err));
      return 0;
    }
  }

  async clearExpired(): Promise<number> {
    try {
      const { count, error } = await this.supabase
        .from(this.table)
        .delete({ count: 'exact' })
        .lte('expires_at', new Date(this.now()).toISOString());

      if (error) throw new Error(error.message);
      return count ?? 0;
    } catch (err) {
      console.error('[SupabaseCacheStore.clearExpired] Delete failed:', getErrorMessage(err));
      return 0;
    }
  }

  async stats(): Promise<CacheStats> {
    try {
      const { data, error } = await this.supabase.from(this.table).select('verdict, expires_at');
      if (error) throw new Error(error.message);

      const now = this.now();
      const stats = emptyStats();
      for (const raw of data ?? []) {
        const parsed = ZStatsRow.safeParse(raw);
        if (!parsed.success) continue;
        stats.total_entries++;
        if (isLive(parsed.data, now)) {
          stats.active_entries++;
          stats.verdicts[parsed.data.verdict] = (stats.verdicts[parsed.data.verdict] ?? 0) + 1;
        } else {
          stats.expired_entries++;
        }
      }
      return stats;
    } catch (err) {
      console.error('[SupabaseCacheStore.stats] Read failed:', getErrorMessage(err));
      return emptyStats();
    }
  }
}
