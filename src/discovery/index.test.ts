import { describe, expect, it, vi } from "vitest";
import { SourceError } from "../core/errors";
import { fakeSource, makePosting } from "../testing/fakes";
import { discover, discoverWindows, mergePostings } from "./index";
import { parseWindow } from "./window";

const now = new Date("2024-05-01T12:00:00.000Z");
const day = parseWindow("24h");

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("discover", () => {
  it("orders merged postings by date, then source, then id, whatever order sources answer in", async () => {
    const slow = fakeSource("lever:acme", async () => {
      await delay(10);
      return [
        makePosting({ source: "lever:acme", sourceId: "2", postedAt: "2024-05-01T09:00:00Z", url: "https://l.example/2" }),
        makePosting({ source: "lever:acme", sourceId: "1", postedAt: "2024-05-01T11:00:00Z", url: "https://l.example/1" }),
      ];
    });
    const fast = fakeSource("greenhouse:acme", async () => [
      makePosting({ source: "greenhouse:acme", sourceId: "9", postedAt: "2024-05-01T09:00:00Z", url: "https://g.example/9" }),
    ]);

    const result = await discover([slow, fast], day, { now });

    expect(result.postings.map((posting) => `${posting.source}/${posting.sourceId}`)).toEqual([
      "lever:acme/1",
      "greenhouse:acme/9",
      "lever:acme/2",
    ]);
    expect(result.countsBySource).toEqual({ "lever:acme": 2, "greenhouse:acme": 1 });
    expect(result.failures).toEqual([]);
  });

  it("keeps one posting per fingerprint across repeated calls", async () => {
    const source = fakeSource("remotive", async () => [
      makePosting({ sourceId: "1", url: "https://jobs.example.com/a?utm_source=feed" }),
      makePosting({ sourceId: "1", url: "https://jobs.example.com/a" }),
    ]);

    const first = await discover([source], day, { now });
    const second = await discover([source], day, { now });
    const merged = mergePostings([...first.postings, ...second.postings]);

    expect(first.postings).toHaveLength(1);
    expect(merged).toHaveLength(1);
    expect(merged[0].fingerprint).toBe(first.postings[0].fingerprint);
  });

  it("drops postings outside the window", async () => {
    const source = fakeSource("remotive", async () => [
      makePosting({ sourceId: "new", url: "https://jobs.example.com/new", postedAt: "2024-05-01T00:00:00Z" }),
      makePosting({ sourceId: "old", url: "https://jobs.example.com/old", postedAt: "2024-04-20T00:00:00Z" }),
    ]);

    const result = await discover([source], day, { now });

    expect(result.postings.map((posting) => posting.sourceId)).toEqual(["new"]);
  });

  it("skips a failing source and reports it", async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const broken = fakeSource("lever:down", async () => {
      throw new SourceError("lever:down", "lever:down fetch failed: 503");
    });
    const healthy = fakeSource("remotive", async () => [makePosting()]);

    const result = await discover([broken, healthy], day, { now, logger });

    expect(result.postings).toHaveLength(1);
    expect(result.failures).toEqual([{ name: "lever:down", error: "lever:down fetch failed: 503" }]);
    expect(result.countsBySource["lever:down"]).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith("Source lever:down failed for window 24h: lever:down fetch failed: 503");
  });

  it("throws when every source fails", async () => {
    const broken = fakeSource("remotive", async () => {
      throw new Error("offline");
    });

    await expect(discover([broken], day, { now })).rejects.toBeInstanceOf(SourceError);
  });
});

describe("discoverWindows", () => {
  it("queries each window and merges the results", async () => {
    const seen: string[] = [];
    const source = fakeSource("remotive", async (window) => {
      seen.push(window.label);
      return [
        makePosting({ sourceId: "1", url: "https://jobs.example.com/1", postedAt: "2024-05-01T10:00:00Z" }),
        makePosting({ sourceId: "2", url: "https://jobs.example.com/2", postedAt: "2024-04-29T10:00:00Z" }),
      ];
    });

    const result = await discoverWindows([source], ["3d", "24h"].map(parseWindow), { now });

    expect(seen).toEqual(["24h", "3d"]);
    expect(result.postings.map((posting) => posting.sourceId)).toEqual(["1", "2"]);
    expect(result.countsBySource).toEqual({ remotive: 2 });
  });

  it("fails only when no window produced results", async () => {
    const broken = fakeSource("remotive", async () => {
      throw new Error("offline");
    });

    await expect(discoverWindows([broken], [day], { now })).rejects.toThrow("All 1 sources failed for window 24h");
  });
});
