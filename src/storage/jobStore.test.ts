import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makePosting } from "../testing/fakes";
import { FileJobStore } from "./jobStore";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "hireloop-jobs-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("FileJobStore", () => {
  it("returns nothing before the first write", async () => {
    await expect(new FileJobStore(dir).loadAll()).resolves.toEqual([]);
  });

  it("reloads written postings with their fingerprints", async () => {
    const store = new FileJobStore(dir);
    const posting = makePosting({ tags: ["node"] });

    await store.writeAll([posting]);

    expect(await new FileJobStore(dir).loadAll()).toEqual([posting]);
  });

  it("replaces postings with the same fingerprint on upsert", async () => {
    const store = new FileJobStore(dir);
    const first = makePosting({ sourceId: "1", url: "https://jobs.example.com/acme/1" });
    const other = makePosting({ sourceId: "2", url: "https://jobs.example.com/acme/2" });
    await store.writeAll([first, other]);

    const updated = makePosting({ sourceId: "1", url: "https://jobs.example.com/acme/1", title: "Senior Backend Engineer" });
    await store.upsertMany([updated]);

    const loaded = await store.loadAll();
    expect(loaded.map((posting) => posting.title)).toEqual(["Senior Backend Engineer", "Backend Engineer"]);
    expect(loaded[0].fingerprint).toBe(first.fingerprint);
  });

  it("drops entries missing required fields", async () => {
    const store = new FileJobStore(dir);
    fs.writeFileSync(store.getPath(), JSON.stringify([{ title: "No source" }, makePosting()]));

    expect(await store.loadAll()).toHaveLength(1);
  });
});
