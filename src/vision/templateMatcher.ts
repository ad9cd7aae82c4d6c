import { PNG } from "pngjs";

export interface GrayImage {
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;
}

export interface TemplateMatch {
  x: number;
  y: number;
  confidence: number;
  template: string;
}

export interface MatchOptions {
  threshold: number;
  scales?: number[];
}

export interface NamedTemplate {
  name: string;
  image: GrayImage;
}

export function createGrayImage(width: number, height: number, fill = 1): GrayImage {
  return { width, height, data: new Float32Array(width * height).fill(fill) };
}

export function decodePng(buffer: Buffer): GrayImage {
  const png = PNG.sync.read(buffer);
  return toGray(png.width, png.height, png.data);
}

// Luma in [0, 1]; transparent pixels are composited over white.
export function toGray(width: number, height: number, rgba: Uint8Array): GrayImage {
  const data = new Float32Array(width * height);
  for (let i = 0; i < width * height; i += 1) {
    const offset = i * 4;
    const alpha = rgba[offset + 3] / 255;
    const luma = (0.299 * rgba[offset] + 0.587 * rgba[offset + 1] + 0.114 * rgba[offset + 2]) / 255;
    data[i] = luma * alpha + (1 - alpha);
  }
  return { width, height, data };
}

export function resizeGray(image: GrayImage, scale: number): GrayImage {
  const width = Math.max(1, Math.round(image.width * scale));
  const height = Math.max(1, Math.round(image.height * scale));
  if (width === image.width && height === image.height) {
    return image;
  }
  const data = new Float32Array(width * height);
  for (let y = 0; y < height; y += 1) {
    const sy = Math.min(image.height - 1, Math.floor(y / scale));
    for (let x = 0; x < width; x += 1) {
      const sx = Math.min(image.width - 1, Math.floor(x / scale));
      data[y * width + x] = image.data[sy * image.width + sx];
    }
  }
  return { width, height, data };
}

interface PreparedTemplate {
  width: number;
  height: number;
  centered: Float32Array;
  norm: number;
}

function prepare(template: GrayImage): PreparedTemplate | null {
  const count = template.width * template.height;
  let sum = 0;
  for (let i = 0; i < count; i += 1) {
    sum += template.data[i];
  }
  const mean = sum / count;
  const centered = new Float32Array(count);
  let squares = 0;
  for (let i = 0; i < count; i += 1) {
    centered[i] = template.data[i] - mean;
    squares += centered[i] * centered[i];
  }
  if (squares < 1e-9) {
    return null;
  }
  return { width: template.width, height: template.height, centered, norm: Math.sqrt(squares) };
}

// Zero-mean normalized cross-correlation of the template placed at (x, y).
function correlate(image: GrayImage, template: PreparedTemplate, x: number, y: number): number {
  const count = template.width * template.height;
  let sum = 0;
  for (let ty = 0; ty < template.height; ty += 1) {
    const row = (y + ty) * image.width + x;
    for (let tx = 0; tx < template.width; tx += 1) {
      sum += image.data[row + tx];
    }
  }
  const mean = sum / count;

  let dot = 0;
  let squares = 0;
  for (let ty = 0; ty < template.height; ty += 1) {
    const row = (y + ty) * image.width + x;
    const trow = ty * template.width;
    for (let tx = 0; tx < template.width; tx += 1) {
      const value = image.data[row + tx] - mean;
      dot += value * template.centered[trow + tx];
      squares += value * value;
    }
  }
  if (squares < 1e-9) {
    return 0;
  }
  return dot / (Math.sqrt(squares) * template.norm);
}

function bestPlacement(
  image: GrayImage,
  template: PreparedTemplate
): { x: number; y: number; confidence: number } | null {
  const maxX = image.width - template.width;
  const maxY = image.height - template.height;
  if (maxX < 0 || maxY < 0) {
    return null;
  }

  const stride = Math.max(1, Math.floor(Math.min(template.width, template.height) / 4));
  let best = { x: 0, y: 0, confidence: -Infinity };
  for (let y = 0; y <= maxY; y += stride) {
    for (let x = 0; x <= maxX; x += stride) {
      const confidence = correlate(image, template, x, y);
      if (confidence > best.confidence) {
        best = { x, y, confidence };
      }
    }
  }

  const coarse = best;
  for (let y = Math.max(0, coarse.y - stride); y <= Math.min(maxY, coarse.y + stride); y += 1) {
    for (let x = Math.max(0, coarse.x - stride); x <= Math.min(maxX, coarse.x + stride); x += 1) {
      const confidence = correlate(image, template, x, y);
      if (confidence > best.confidence) {
        best = { x, y, confidence };
      }
    }
  }
  return best;
}

export function matchTemplates(
  screenshot: GrayImage,
  templates: readonly NamedTemplate[],
  options: MatchOptions
): TemplateMatch | null {
  const scales = options.scales && options.scales.length > 0 ? options.scales : [1];
  let best: TemplateMatch | null = null;

  for (const template of templates) {
    for (const scale of scales) {
      const prepared = prepare(resizeGray(template.image, scale));
      if (!prepared) {
        continue;
      }
      const placement = bestPlacement(screenshot, prepared);
      if (!placement || placement.confidence < options.threshold) {
        continue;
      }
      if (!best || placement.confidence > best.confidence) {
        best = {
          x: placement.x + Math.floor(prepared.width / 2),
          y: placement.y + Math.floor(prepared.height / 2),
          confidence: placement.confidence,
          template: template.name,
        };
      }
    }
  }
  return best;
}
