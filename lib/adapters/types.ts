// lib/adapters/types.ts

/**
 * Text pulled from a job posting page; JSON-LD JobPosting hints come first in raw_text.
 * When scrape_success is false raw_text is "".
 */
export type ScrapedContent = {
  raw_text: string;
  scrape_success: boolean;
};

export type FetchMeta = {
  status: number;
  ok: boolean;
  started_at: string;   // ISO
  finished_at: string;  // ISO
  elapsed_ms: number;
};

/**
 * Retrieves a posting's text. Ordinary network/HTTP/parse failures come back as
 * scrape_success=false; throwing is reserved for programmer errors.
 * Implementations bound their own wait time.
 */
export interface ContentFetcher {
  fetch(url: string): Promise<ScrapedContent>;
}

export function failedScrape(): ScrapedContent {
  return { raw_text: "", scrape_success: false };
}
