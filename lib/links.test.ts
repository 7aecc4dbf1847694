import { describe, expect, it } from "vitest";
import { extractUrls, firstJobUrl, isJobUrl } from "./links";

describe("extractUrls", () => {
  it("trims trailing punctuation", () => {
    expect(extractUrls("Look: https://boards.greenhouse.io/acme/jobs/123. Also (http://x.io/a)")).toEqual([
      "https://boards.greenhouse.io/acme/jobs/123",
      "http://x.io/a",
    ]);
    expect(extractUrls("no links here")).toEqual([]);
  });
});

describe("isJobUrl", () => {
  it("matches known job sites and careers paths", () => {
    expect(isJobUrl("https://boards.greenhouse.io/acme/jobs/123")).toBe(true);
    expect(isJobUrl("https://acme.com/careers/42")).toBe(true);
    expect(isJobUrl("https://example.com/blog/post")).toBe(false);
  });
});

describe("firstJobUrl", () => {
  it("skips links that are not job postings", () => {
    expect(firstJobUrl("see https://example.com/blog and https://jobs.lever.co/acme/1")).toBe(
      "https://jobs.lever.co/acme/1"
    );
    expect(firstJobUrl("see https://example.com/blog")).toBeNull();
  });
});
