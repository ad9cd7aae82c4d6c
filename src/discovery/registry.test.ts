import { afterEach, describe, expect, it, vi } from "vitest";
import { buildSources } from "./registry";
import { parseWindow } from "./window";

afterEach(() => {
  vi.unstubAllGlobals();
});

function stubFetch(body: unknown) {
  const fetchMock = vi.fn().mockResolvedValue({ ok: true, status: 200, json: async () => body });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("buildSources", () => {
  it("names sources by type and slug", () => {
    const sources = buildSources([
      { type: "remotive" },
      { type: "greenhouse", slug: "acme", company: "Acme" },
      { type: "lever", slug: "globex", company: "Globex" },
    ]);
    expect(sources.map((source) => source.name)).toEqual(["remotive", "greenhouse:acme", "lever:globex"]);
  });

  it("reads greenhouse boards with first publication dates and departments", async () => {
    const published = new Date(Date.now() - 3_600_000).toISOString();
    const fetchMock = stubFetch({
      jobs: [
        {
          id: 55,
          title: "Site Reliability Engineer",
          location: { name: "Berlin" },
          departments: [{ name: "Infrastructure" }, {}],
          absolute_url: "https://boards.greenhouse.io/acme/jobs/55",
          content: "&lt;p&gt;Kubernetes&lt;/p&gt;",
          first_published: published,
          updated_at: new Date().toISOString(),
        },
      ],
    });

    const [source] = buildSources([{ type: "greenhouse", slug: "acme", company: "Acme" }]);
    const postings = await source.list(parseWindow("24h"));

    expect(fetchMock.mock.calls[0][0]).toBe("https://boards-api.greenhouse.io/v1/boards/acme/jobs?content=true");
    expect(postings).toHaveLength(1);
    expect(postings[0]).toMatchObject({
      source: "greenhouse:acme",
      sourceId: "55",
      company: "Acme",
      location: "Berlin",
      postedAt: published,
      tags: ["Infrastructure"],
    });
  });

  it("reads lever postings from millisecond timestamps", async () => {
    const createdAt = Date.now() - 2 * 3_600_000;
    stubFetch([
      {
        id: "abc-123",
        text: "Data Engineer",
        categories: { location: "Remote", team: "Data", commitment: "Full-time" },
        hostedUrl: "https://jobs.lever.co/globex/abc-123",
        createdAt,
        descriptionPlain: "Airflow and dbt",
      },
      { id: "no-date", text: "Missing timestamp" },
    ]);

    const [source] = buildSources([{ type: "lever", slug: "globex", company: "Globex" }]);
    const postings = await source.list(parseWindow("24h"));

    expect(postings).toHaveLength(1);
    expect(postings[0]).toMatchObject({
      source: "lever:globex",
      sourceId: "abc-123",
      title: "Data Engineer",
      description: "Airflow and dbt",
      postedAt: new Date(createdAt).toISOString(),
      tags: ["Data", "Full-time"],
    });
  });
});
