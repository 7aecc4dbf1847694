// lib/adapters/web.ts
import { z } from "zod";
import type { ContentFetcher, FetchMeta, ScrapedContent } from "./types";
import { failedScrape } from "./types";
import { fetchWithRetry, htmlToPlainText } from "./util";
import { getErrorMessage } from "../safe";

/** Tiny helper to decode a few common HTML entities in <script> contents. */
function decodeBasicEntities(s: string): string {
  return s
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'");
}

/** Extract all <script type="application/ld+json">...</script> blocks. */
function extractJsonLdBlocks(html: string): string[] {
  const blocks: string[] = [];
  const re =
    /<script[^>]*type=["']application\/ld\+json["'][^>]*>([\s\S]*?)<\/script>/gi;
  let m: RegExpExecArray | null;
  while ((m = re.exec(html)) !== null) {
    const raw = (m[1] ?? "").trim();
    if (raw) blocks.push(raw);
  }
  return blocks;
}

/** Best-effort JSON parse with very light cleanup. Returns undefined if it can’t parse. */
function safeParseJsonLd(s: string): unknown {
  try {
    // Some sites HTML-escape the JSON text inside the script tag.
    return JSON.parse(decodeBasicEntities(s.trim()));
  } catch {
    return undefined;
  }
}

/* ------------------------------ Zod Schemas ------------------------------ */
/** https://schema.org/Place (only the address bits that say where) */
const ZPlace = z
  .object({
    name: z.string().optional(),
    address: z
      .union([
        z.string(),
        z
          .object({
            addressLocality: z.string().optional(),
            addressRegion: z.string().optional(),
            addressCountry: z
              .union([z.string(), z.object({ name: z.string().optional() }).catchall(z.unknown())])
              .optional(),
          })
          .catchall(z.unknown()),
      ])
      .optional(),
  })
  .catchall(z.unknown());

const ZPlaces = z.union([ZPlace, z.array(ZPlace)]);

/** Minimal JobPosting subset of concern */
const ZJobPosting = z
  .object({
    "@type": z.union([z.string(), z.array(z.string())]),
    title: z.string().optional(),
    jobLocationType: z.string().optional(), // "TELECOMMUTE" for remote roles
    jobLocation: ZPlaces.optional(),
    applicantLocationRequirements: ZPlaces.optional(),
  })
  .catchall(z.unknown());

export type JobPosting = z.infer<typeof ZJobPosting>;
type Place = z.infer<typeof ZPlace>;

function isJobPosting(p: JobPosting): boolean {
  const t = p["@type"];
  return Array.isArray(t) ? t.includes("JobPosting") : t === "JobPosting";
}

function describePlace(place: Place): string {
  const a = place.address;
  if (typeof a === "string") return a.trim();
  const country = typeof a?.addressCountry === "string" ? a.addressCountry : a?.addressCountry?.name;
  const parts = [place.name, a?.addressLocality, a?.addressRegion, country].filter(
    (s): s is string => typeof s === "string" && s.trim() !== ""
  );
  return Array.from(new Set(parts)).join(", ");
}

function describePlaces(places: Place | Place[] | undefined): string[] {
  if (!places) return [];
  return (Array.isArray(places) ? places : [places]).map(describePlace).filter(Boolean);
}

/** Flatten JSON-LD (arrays and @graph) and keep the JobPosting items. */
export function findJobPostings(html: string): JobPosting[] {
  const items: unknown[] = [];
  for (const block of extractJsonLdBlocks(html).map(safeParseJsonLd)) {
    if (block === undefined) continue;
    const list: unknown[] = Array.isArray(block) ? block : [block];
    for (const item of list) {
      items.push(item);
      if (item && typeof item === "object" && "@graph" in item && Array.isArray(item["@graph"])) {
        items.push(...item["@graph"]);
      }
    }
  }

  const postings: JobPosting[] = [];
  for (const item of items) {
    const parsed = ZJobPosting.safeParse(item);
    if (parsed.success && isJobPosting(parsed.data)) postings.push(parsed.data);
  }
  return postings;
}

/**
 * Turns a JobPosting into lines the rule engine can read,
 * e.g. "Location type: Remote" / "Applicant location requirements: Ghana".
 */
export function jobPostingHints(posting: JobPosting): string[] {
  const lines: string[] = [];
  const locations = describePlaces(posting.jobLocation);
  const applicant = describePlaces(posting.applicantLocationRequirements);
  const remote = posting.jobLocationType?.toUpperCase() === "TELECOMMUTE";

  if (posting.title) lines.push(`Job title: ${posting.title}`);
  if (remote) lines.push("Location type: Remote");
  if (locations.length) lines.push(`Location: ${locations.join("; ")}`);
  if (applicant.length) lines.push(`Applicant location requirements: ${applicant.join("; ")}`);
  return lines;
}

export type WebContentFetcherOptions = {
  timeoutMs?: number;
  retries?: number;
};

/** Generic page scraper: one bounded GET, JSON-LD hints first, then the visible text. */
export class WebContentFetcher implements ContentFetcher {
  private readonly timeoutMs: number;
  private readonly retries: number;

  constructor(opts: WebContentFetcherOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.retries = opts.retries ?? 1;
  }

  async fetch(url: string): Promise<ScrapedContent> {
    // Validate URL early
    try {
      new URL(url);
    } catch {
      return failedScrape();
    }

    const started = new Date();
    let res: Response;
    let html: string;
    try {
      res = await fetchWithRetry(
        url,
        { redirect: "follow" },
        { retries: this.retries, timeoutMs: this.timeoutMs }
      );
      html = res.ok ? await res.text() : "";
    } catch (err) {
      console.warn(`[WebContentFetcher] Failed to fetch ${url}:`, getErrorMessage(err));
      return failedScrape();
    }
    const finished = new Date();

    const meta: FetchMeta = {
      status: res.status,
      ok: res.ok,
      started_at: started.toISOString(),
      finished_at: finished.toISOString(),
      elapsed_ms: Math.max(0, finished.getTime() - started.getTime()),
    };

    if (!res.ok) {
      console.warn(`[WebContentFetcher] ${url} answered ${meta.status} after ${meta.elapsed_ms}ms`);
      return failedScrape();
    }

    const posting = findJobPostings(html)[0];
    const hints = posting ? jobPostingHints(posting) : [];
    const pageText = htmlToPlainText(html);
    const raw_text = [...hints, pageText].filter(Boolean).join("\n\n");

    if (!raw_text) {
      console.warn(`[WebContentFetcher] ${url} returned no readable text`);
      return failedScrape();
    }

    console.log(`[WebContentFetcher] Scraped ${url}: ${raw_text.length} chars in ${meta.elapsed_ms}ms`);
    return { raw_text, scrape_success: true };
  }
}
