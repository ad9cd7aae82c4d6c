import { describe, expect, it } from "vitest";
import { encodeGrayPng, noise, pasted } from "../testing/images";
import { createGrayImage, decodePng, matchTemplates, resizeGray, toGray } from "./templateMatcher";

const button = noise(8, 8, 7);
const templates = [{ name: "apply-button/primary.png", image: decodePng(encodeGrayPng(8, 8, button)) }];

function screenshotWithButton(): ReturnType<typeof decodePng> {
  return decodePng(encodeGrayPng(40, 30, pasted(255, { x: 20, y: 10 }, { width: 8, height: 8 }, button)));
}

describe("toGray", () => {
  it("composites transparent pixels over white", () => {
    const gray = toGray(2, 1, new Uint8Array([0, 0, 0, 0, 0, 0, 0, 255]));
    expect(Array.from(gray.data)).toEqual([1, 0]);
  });
});

describe("resizeGray", () => {
  it("scales with nearest neighbour sampling", () => {
    const image = { width: 2, height: 1, data: new Float32Array([0, 1]) };
    const doubled = resizeGray(image, 2);
    expect(doubled.width).toBe(4);
    expect(Array.from(doubled.data)).toEqual([0, 0, 1, 1]);
    expect(resizeGray(image, 1)).toBe(image);
  });
});

describe("matchTemplates", () => {
  it("finds the template centre in a screenshot", () => {
    const match = matchTemplates(screenshotWithButton(), templates, { threshold: 0.8, scales: [1] });

    expect(match).not.toBeNull();
    expect(match?.x).toBe(24);
    expect(match?.y).toBe(14);
    expect(match?.template).toBe("apply-button/primary.png");
    expect(match?.confidence).toBeCloseTo(1, 4);
  });

  it("keeps the exact-scale match when other scales are tried", () => {
    const match = matchTemplates(screenshotWithButton(), templates, { threshold: 0.8, scales: [0.9, 1, 1.1] });

    expect(match?.x).toBe(24);
    expect(match?.y).toBe(14);
  });

  it("returns null when nothing clears the threshold", () => {
    const blank = createGrayImage(40, 30, 1);
    expect(matchTemplates(blank, templates, { threshold: 0.8 })).toBeNull();
  });

  it("ignores flat templates and templates larger than the screenshot", () => {
    const flat = [{ name: "flat", image: createGrayImage(4, 4, 0.5) }];
    expect(matchTemplates(screenshotWithButton(), flat, { threshold: 0.1 })).toBeNull();

    const tiny = createGrayImage(4, 4, 1);
    expect(matchTemplates(tiny, templates, { threshold: 0.1 })).toBeNull();
  });
});
