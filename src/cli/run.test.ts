import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { defaultConfig, loadConfig } from "../config";
import { ConfigError } from "../core/errors";
import { redactConfig, redactValue, resolveHeadless, runCli } from "./run";

let dir: string;
let file: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "hireloop-cli-"));
  file = path.join(dir, "config.json");
  vi.spyOn(process.stdout, "write").mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("redactValue", () => {
  it("keeps only the ends of longer values", () => {
    expect(redactValue("ada@example.com")).toBe("ad***om");
    expect(redactValue("1234")).toBe("***");
    expect(redactValue("")).toBe("");
  });
});

describe("redactConfig", () => {
  it("hides contact details and the resume directory", () => {
    const config = defaultConfig(dir);
    const redacted = redactConfig({
      ...config,
      profile: { ...config.profile, fullName: "Ada Lovelace", email: "ada@example.com", phone: "555-0100" },
      resume: { path: "/home/ada/resume.pdf", sha256: "abcdef0123" },
    });

    expect(redacted.profile).toMatchObject({ fullName: "Ada Lovelace", email: "ad***om", phone: "55***00" });
    expect(redacted.resume).toEqual({ path: "***resume.pdf", sha256: "ab***23" });
  });
});

describe("resolveHeadless", () => {
  it("lets either flag override the configured mode", () => {
    expect(resolveHeadless(["--headed"], true)).toBe(false);
    expect(resolveHeadless(["--headless"], false)).toBe(true);
    expect(resolveHeadless(["--limit", "3"], true)).toBe(true);
    expect(resolveHeadless(["--limit", "3"], false)).toBe(false);
  });
});

describe("runCli", () => {
  it("merges profile flags into the config file", async () => {
    await runCli([
      "--config",
      file,
      "profile",
      "set",
      "--full-name",
      "Ada Lovelace",
      "--email",
      "ada@example.com",
      "--skill",
      "typescript, node",
      "--skill",
      "sql",
    ]);

    expect(loadConfig(file).profile).toMatchObject({
      fullName: "Ada Lovelace",
      email: "ada@example.com",
      skills: ["typescript", "node", "sql"],
    });
  });

  it("rejects an unknown record status", async () => {
    await expect(runCli(["--config", file, "records", "--status", "done"])).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects non-positive numeric flags", async () => {
    await expect(runCli(["--config", file, "evict", "--days", "0"])).rejects.toThrow(
      "--days expects a positive number (got 0)"
    );
  });
});
