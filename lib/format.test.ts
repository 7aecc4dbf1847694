import { describe, expect, it } from "vitest";
import { formatVerdictLabel, renderReply } from "./format";
import { makeResult } from "./verdict/types";

describe("formatVerdictLabel", () => {
  it("title-cases the verdict", () => {
    expect(formatVerdictLabel("visa_sponsorship")).toBe("Visa Sponsorship");
    expect(formatVerdictLabel("not_helpful")).toBe("Not Helpful");
  });
});

describe("renderReply", () => {
  it("renders emoji, label and reason", () => {
    expect(renderReply(makeResult("visa_sponsorship", "Offers visa sponsorship: 'visa sponsorship'", "rule"))).toBe(
      "🌍 **Visa Sponsorship**\n\nOffers visa sponsorship: 'visa sponsorship'"
    );
  });

  it("marks cache hits", () => {
    expect(renderReply(makeResult("not_helpful", "Location restricted: 'us only'", "cache"))).toBe(
      "❌ **Not Helpful**\n\nLocation restricted: 'us only' (cached)"
    );
  });
});
