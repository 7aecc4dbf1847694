// lib/links.ts
// Helpers for the chat layer: find job links in a message.

// Job sites (and generic careers paths) worth analyzing
export const JOB_DOMAINS = [
  "linkedin.com/jobs",
  "indeed.com",
  "greenhouse.io",
  "lever.co",
  "workable.com",
  "angel.co/jobs",
  "wellfound.com",
  "remoteok.com",
  "weworkremotely.com",
  "glassdoor.com/job",
  "ziprecruiter.com",
  "careers.google.com",
  "jobs.apple.com",
  "amazon.jobs",
  "ashbyhq.com",
  "smartrecruiters.com",
  "/jobs/",
  "/careers/",
] as const;

const URL_RE = /https?:\/\/[^\s<>"'`]+/gi;

/** http(s) URLs in a message, trailing punctuation trimmed. */
export function extractUrls(text: string): string[] {
  const out: string[] = [];
  for (const m of text.matchAll(URL_RE)) {
    const url = m[0].replace(/[.,;:!?)\]]+$/, "");
    if (url) out.push(url);
  }
  return out;
}

export function isJobUrl(url: string, domains: readonly string[] = JOB_DOMAINS): boolean {
  const u = url.toLowerCase();
  return domains.some((d) => u.includes(d));
}

/** First link in the message that looks like a job posting, if any. */
export function firstJobUrl(text: string): string | null {
  return extractUrls(text).find((u) => isJobUrl(u)) ?? null;
}
