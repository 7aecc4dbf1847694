import { beforeEach, describe, expect, it, vi } from "vitest";
import { WebContentFetcher, findJobPostings, jobPostingHints } from "./web";
import { htmlToPlainText } from "./util";

const POSTING_HTML = `<html><head>
<script type="application/ld+json">
{"@context":"https://schema.org","@type":"JobPosting","title":"Backend Engineer",
 "jobLocationType":"TELECOMMUTE",
 "applicantLocationRequirements":{"@type":"Country","name":"Ghana"}}
</script>
</head><body><h1>Backend Engineer</h1><p>Join us</p></body></html>`;

function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": "text/html" } });
}

describe("htmlToPlainText", () => {
  it("drops scripts and tags and decodes entities", () => {
    expect(htmlToPlainText("<p>Hello&nbsp;<b>world</b></p><script>x()</script>")).toBe("Hello world");
    expect(htmlToPlainText("<p>R&amp;D &quot;team&quot;</p>")).toBe('R&D "team"');
  });
});

describe("findJobPostings", () => {
  it("finds postings inside @graph", () => {
    const html = `<script type="application/ld+json">{"@graph":[{"@type":"Organization","name":"Acme"},
      {"@type":"JobPosting","title":"Designer","jobLocation":{"address":{"addressLocality":"Accra","addressCountry":"GH"}}}]}</script>`;

    const [posting] = findJobPostings(html);
    expect(posting?.title).toBe("Designer");
    expect(posting && jobPostingHints(posting)).toEqual(["Job title: Designer", "Location: Accra, GH"]);
  });

  it("skips blocks that are not valid JSON", () => {
    expect(findJobPostings('<script type="application/ld+json">{not json</script>')).toEqual([]);
  });
});

describe("WebContentFetcher", () => {
  const fetchMock = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    return () => {
      vi.unstubAllGlobals();
    };
  });

  it("puts JSON-LD hints ahead of the page text", async () => {
    fetchMock.mockResolvedValueOnce(htmlResponse(POSTING_HTML));

    const content = await new WebContentFetcher({ retries: 0 }).fetch("https://jobs.example.com/1");

    expect(content).toEqual({
      raw_text:
        "Job title: Backend Engineer\n\nLocation type: Remote\n\nApplicant location requirements: Ghana\n\nBackend Engineer\n Join us",
      scrape_success: true,
    });
  });

  it("sends a browser User-Agent", async () => {
    fetchMock.mockResolvedValueOnce(htmlResponse("<p>Hi</p>"));

    await new WebContentFetcher({ retries: 0 }).fetch("https://jobs.example.com/1");

    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get("User-Agent")).toContain("Mozilla/5.0");
  });

  it("fails softly on a non-2xx answer", async () => {
    fetchMock.mockResolvedValueOnce(htmlResponse("gone", 404));

    expect(await new WebContentFetcher({ retries: 0 }).fetch("https://jobs.example.com/1")).toEqual({
      raw_text: "",
      scrape_success: false,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("fails softly on a network error", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    expect(await new WebContentFetcher({ retries: 0 }).fetch("https://jobs.example.com/1")).toEqual({
      raw_text: "",
      scrape_success: false,
    });
  });

  it("retries a 503 once", async () => {
    fetchMock
      .mockResolvedValueOnce(htmlResponse("busy", 503))
      .mockResolvedValueOnce(htmlResponse("<p>Work from anywhere</p>"));

    const content = await new WebContentFetcher({ retries: 1 }).fetch("https://jobs.example.com/1");

    expect(content).toEqual({ raw_text: "Work from anywhere", scrape_success: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not fetch an invalid URL", async () => {
    expect((await new WebContentFetcher().fetch("not a url")).scrape_success).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("treats an empty page as a failed scrape", async () => {
    fetchMock.mockResolvedValueOnce(htmlResponse("<html><body>  </body></html>"));

    expect((await new WebContentFetcher({ retries: 0 }).fetch("https://jobs.example.com/1")).scrape_success).toBe(false);
  });
});
