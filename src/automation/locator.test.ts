import { describe, expect, it, vi } from "vitest";
import { FakeBrowserSession, fakeSelector } from "../testing/fakes";
import { encodeGrayPng, noise, pasted } from "../testing/images";
import { createTemplateLibrary, emptyTemplateLibrary } from "../vision/templateLibrary";
import { decodePng } from "../vision/templateMatcher";
import { ElementLocator } from "./locator";

const button = noise(8, 8, 11);
const library = createTemplateLibrary({
  "apply-button": [{ name: "apply-button/primary.png", image: decodePng(encodeGrayPng(8, 8, button)) }],
});
const screenshotWithButton = encodeGrayPng(40, 30, pasted(255, { x: 4, y: 6 }, { width: 8, height: 8 }, button));
const blankScreenshot = encodeGrayPng(40, 30, () => 255);

describe("ElementLocator", () => {
  it("returns a unique structural match without taking a screenshot", async () => {
    const session = new FakeBrowserSession({ visible: ["apply-button"], screenshot: screenshotWithButton });
    const locator = new ElementLocator({ templates: library });

    const result = await locator.locate(session, "apply-button");

    expect(result).toEqual({
      kind: "found",
      target: { kind: "element", element: { ref: "apply-button", selector: fakeSelector("apply-button"), text: "apply-button" } },
      strategy: "structural",
    });
    expect(session.screenshots).toBe(0);
  });

  it("falls back to the image match exactly once when the structure is ambiguous", async () => {
    const session = new FakeBrowserSession({ ambiguous: ["apply-button"], screenshot: screenshotWithButton });
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const locator = new ElementLocator({ templates: library, logger });

    const result = await locator.locate(session, "apply-button");

    expect(session.screenshots).toBe(1);
    expect(result.kind).toBe("found");
    if (result.kind === "found") {
      expect(result.strategy).toBe("image");
      expect(result.target).toMatchObject({ kind: "point", x: 8, y: 10, template: "apply-button/primary.png" });
    }
    expect(logger.info).toHaveBeenCalledTimes(1);
  });

  it("falls back exactly once when nothing matches structurally", async () => {
    const session = new FakeBrowserSession({ screenshot: blankScreenshot });
    const locator = new ElementLocator({ templates: library });

    const result = await locator.locate(session, "apply-button");

    expect(session.screenshots).toBe(1);
    expect(result).toEqual({ kind: "not-found", reason: "no structural match; no template above 0.8" });
  });

  it("reports the ambiguity when no templates exist for the intent", async () => {
    const session = new FakeBrowserSession({ ambiguous: ["submit-button"] });
    const locator = new ElementLocator({ templates: emptyTemplateLibrary() });

    const result = await locator.locate(session, "submit-button");

    expect(result.kind).toBe("not-found");
    if (result.kind === "not-found") {
      expect(result.reason).toMatch(/^2 ambiguous matches for .*; no templates for submit-button$/);
    }
    expect(session.screenshots).toBe(0);
  });

  it("accepts the first of several matches for presence checks", async () => {
    const session = new FakeBrowserSession({ ambiguous: ["confirmation"] });
    const locator = new ElementLocator({ templates: emptyTemplateLibrary() });

    const result = await locator.locate(session, "confirmation");

    expect(result.kind).toBe("found");
    expect(session.screenshots).toBe(0);
  });

  it("honours a stricter threshold", async () => {
    const session = new FakeBrowserSession({ ambiguous: ["apply-button"], screenshot: screenshotWithButton });
    const locator = new ElementLocator({ templates: library, threshold: 1.01, scales: [1] });

    const result = await locator.locate(session, "apply-button");

    expect(result.kind).toBe("not-found");
    expect(session.screenshots).toBe(1);
  });

  it("treats an undecodable screenshot as a miss", async () => {
    const session = new FakeBrowserSession({ screenshot: Buffer.from("not a png") });
    const locator = new ElementLocator({ templates: library });

    const result = await locator.locate(session, "apply-button");

    expect(session.screenshots).toBe(1);
    expect(result.kind).toBe("not-found");
    if (result.kind === "not-found") {
      expect(result.reason).toMatch(/^no structural match; screenshot could not be decoded: /);
    }
  });
});
