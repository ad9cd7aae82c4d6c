import { describe, expect, it } from "vitest";
import { computeFingerprint, createPosting, normalizeText, normalizeUrl } from "./fingerprint";

describe("normalizeUrl", () => {
  it("drops tracking params, www, and trailing slashes", () => {
    expect(normalizeUrl("https://WWW.Example.com/jobs/42/?utm_source=x&gh_src=abc&b=2&a=1")).toBe(
      "example.com/jobs/42?a=1&b=2"
    );
  });

  it("rejects urls without a path or with other schemes", () => {
    expect(normalizeUrl("https://example.com/")).toBeNull();
    expect(normalizeUrl("mailto:jobs@example.com")).toBeNull();
    expect(normalizeUrl("not a url")).toBeNull();
  });
});

describe("computeFingerprint", () => {
  it("is stable across tracking variants of the same url", () => {
    const a = computeFingerprint({
      source: "remotive",
      url: "https://remotive.com/remote-jobs/123?utm_campaign=feed",
      title: "Engineer",
      company: "Acme",
    });
    const b = computeFingerprint({
      source: "remotive",
      url: "https://www.remotive.com/remote-jobs/123/",
      title: "Senior Engineer",
      company: "Other",
    });
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{32}$/);
  });

  it("falls back to title and company when the url is unusable", () => {
    const a = computeFingerprint({ source: "lever:acme", url: "", title: "Data  Engineer!", company: "ACME" });
    const b = computeFingerprint({ source: "lever:acme", url: "", title: "data engineer", company: "acme" });
    const c = computeFingerprint({ source: "lever:other", url: "", title: "data engineer", company: "acme" });
    expect(a).toBe(b);
    expect(a).not.toBe(c);
  });
});

describe("createPosting", () => {
  it("normalizes fields and freezes the result", () => {
    const posting = createPosting({
      source: "remotive",
      sourceId: "7",
      title: "  Platform Engineer ",
      company: " Acme ",
      postedAt: "2024-05-01T10:00:00+02:00",
      url: "https://example.com/jobs/7",
    });
    expect(posting.title).toBe("Platform Engineer");
    expect(posting.company).toBe("Acme");
    expect(posting.location).toBe("");
    expect(posting.postedAt).toBe("2024-05-01T08:00:00.000Z");
    expect(posting.tags).toEqual([]);
    expect(Object.isFrozen(posting)).toBe(true);
  });

  it("throws on an unparseable date", () => {
    expect(() =>
      createPosting({ source: "x", sourceId: "1", title: "t", company: "c", postedAt: "yesterday", url: "" })
    ).toThrow("Invalid postedAt");
  });
});

describe("normalizeText", () => {
  it("collapses punctuation and case", () => {
    expect(normalizeText("  C++ / Go Engineer ")).toBe("c go engineer");
  });
});
