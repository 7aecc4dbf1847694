// lib/adapters/util.ts

export type RetryOptions = {
  /** Extra attempts after the first one. */
  retries?: number;
  baseDelayMs?: number;
  maxBackoffMs?: number;
  /** Per attempt, not overall. */
  timeoutMs?: number;
  userAgent?: string;
};

const DESKTOP_UA =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/** 429 and 5xx are worth another try; everything else is final. */
export function isTransientStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

/** Retry-After as milliseconds (seconds or HTTP-date), null when absent or unreadable. */
export function parseRetryAfter(header: string | null, nowMs = Date.now()): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const at = Date.parse(header);
  return Number.isFinite(at) ? Math.max(0, at - nowMs) : null;
}

/** Exponential backoff, capped; a 429's Retry-After can stretch it up to the cap. */
export function retryDelayMs(
  attempt: number,
  { baseDelayMs, maxBackoffMs }: Required<Pick<RetryOptions, "baseDelayMs" | "maxBackoffMs">>,
  retryAfterMs: number | null = null
): number {
  const backoff = Math.min(maxBackoffMs, baseDelayMs * 2 ** Math.max(0, attempt));
  return retryAfterMs === null ? backoff : Math.min(maxBackoffMs, Math.max(backoff, retryAfterMs));
}

export async function fetchWithRetry(
  url: string,
  opts: RequestInit = {},
  {
    retries = 1,
    baseDelayMs = 250,
    maxBackoffMs = 5_000,
    timeoutMs = 10_000,
    userAgent = DESKTOP_UA,
  }: RetryOptions = {}
): Promise<Response> {
  const baseHeaders = new Headers(opts.headers ?? {});
  if (!baseHeaders.has("User-Agent")) baseHeaders.set("User-Agent", userAgent);
  if (!baseHeaders.has("Accept")) baseHeaders.set("Accept", "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8");

  const callerSignal = opts.signal ?? undefined;
  const delays = { baseDelayMs, maxBackoffMs };
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= retries; attempt++) {
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = callerSignal ? AbortSignal.any([callerSignal, timeout]) : timeout;
    const isLast = attempt === retries;

    let res: Response;
    try {
      res = await fetch(url, { ...opts, headers: new Headers(baseHeaders), signal });
    } catch (err: unknown) {
      if (callerSignal?.aborted) throw new Error("Request was cancelled");
      lastError = err;
      if (isLast) break;
      await sleep(retryDelayMs(attempt, delays));
      continue;
    }

    if (!isTransientStatus(res.status) || isLast) return res;

    const retryAfter = res.status === 429 ? parseRetryAfter(res.headers.get("Retry-After")) : null;
    await sleep(retryDelayMs(attempt, delays, retryAfter));
  }

  const reason = lastError instanceof Error ? lastError.message : String(lastError);
  throw new Error(`Request to ${url} failed after ${retries + 1} attempts: ${reason}`);
}

const ENTITIES: Record<string, string> = {
  "&nbsp;": " ",
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
};

// simple HTML -> text, just enough for the rule patterns
export function htmlToPlainText(html: string): string {
  return html
    .replace(/<(script|style|noscript)\b[\s\S]*?<\/\1>/gi, " ")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|li|h[1-6]|div|section)>/gi, "\n")
    .replace(/<[^>]+>/g, " ")
    .replace(/&(?:nbsp|amp|lt|gt|quot|#39);/g, (e) => ENTITIES[e] ?? e)
    .replace(/\r?\n\s*\r?\n/g, "\n\n")
    .replace(/[ \t]+/g, " ")
    .trim();
}
