import { PNG } from "pngjs";

export type Pixels = (x: number, y: number) => number;

export function encodeGrayPng(width: number, height: number, pixel: Pixels): Buffer {
  const png = new PNG({ width, height });
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const offset = (y * width + x) * 4;
      const value = pixel(x, y);
      png.data[offset] = value;
      png.data[offset + 1] = value;
      png.data[offset + 2] = value;
      png.data[offset + 3] = 255;
    }
  }
  return PNG.sync.write(png);
}

// Deterministic pseudo-random texture in [0, 255].
export function noise(width: number, height: number, seed: number): Pixels {
  const values: number[] = [];
  let state = seed >>> 0;
  for (let i = 0; i < width * height; i += 1) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    values.push(state >>> 24);
  }
  return (x, y) => values[y * width + x];
}

export function pasted(background: number, origin: { x: number; y: number }, size: { width: number; height: number }, patch: Pixels): Pixels {
  return (x, y) => {
    const px = x - origin.x;
    const py = y - origin.y;
    if (px >= 0 && py >= 0 && px < size.width && py < size.height) {
      return patch(px, py);
    }
    return background;
  };
}
