import type { PixelGrid } from '../types/index.js';

export type EdgeSignature = readonly number[];

/** Edge signatures in side order: top, left, bottom, right */
export type EdgeSignatures = readonly [EdgeSignature, EdgeSignature, EdgeSignature, EdgeSignature];

export function packRgba(r: number, g: number, b: number, a: number): number {
  return ((r & 0xff) << 24 | (g & 0xff) << 16 | (b & 0xff) << 8 | (a & 0xff)) >>> 0;
}

export function unpackRgba(value: number): [number, number, number, number] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

export function createPixelGrid(width: number, height: number, data?: ArrayLike<number>): PixelGrid {
  const grid = { width, height, data: new Uint32Array(width * height) };
  if (data) {
    if (data.length !== width * height) {
      throw new RangeError(`Expected ${width * height} pixels, got ${data.length}`);
    }
    grid.data.set(data);
  }
  return grid;
}

export function pixelAt(grid: PixelGrid, x: number, y: number): number {
  return grid.data[y * grid.width + x];
}

/** Left/right reflection */
export function mirrorPixels(grid: PixelGrid): PixelGrid {
  const out = createPixelGrid(grid.width, grid.height);
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      out.data[y * grid.width + x] = pixelAt(grid, grid.width - 1 - x, y);
    }
  }
  return out;
}

/**
 * Rotate counter-clockwise by the given number of quarter turns.
 * Width and height swap on odd turns.
 */
export function rotatePixels(grid: PixelGrid, quarterTurns: number): PixelGrid {
  let current = grid;
  const turns = ((quarterTurns % 4) + 4) % 4;
  for (let t = 0; t < turns; t++) {
    const { width, height } = current;
    const out = createPixelGrid(height, width);
    // The source's right column becomes the top row.
    for (let y = 0; y < width; y++) {
      for (let x = 0; x < height; x++) {
        out.data[y * height + x] = pixelAt(current, width - 1 - y, x);
      }
    }
    current = out;
  }
  return turns === 0 ? createPixelGrid(grid.width, grid.height, grid.data) : current;
}

/** Reflection is applied before rotation */
export function transformPixels(grid: PixelGrid, reflected: boolean, rotation: number): PixelGrid {
  return rotatePixels(reflected ? mirrorPixels(grid) : grid, rotation);
}

export function pixelsEqual(a: PixelGrid, b: PixelGrid): boolean {
  if (a.width !== b.width || a.height !== b.height) return false;
  for (let i = 0; i < a.data.length; i++) {
    if (a.data[i] !== b.data[i]) return false;
  }
  return true;
}

/**
 * Read the four edges of a grid. Horizontal edges run left to right,
 * vertical edges top to bottom.
 */
export function edgeSignatures(grid: PixelGrid): EdgeSignatures {
  const { width, height } = grid;
  const top: number[] = [];
  const bottom: number[] = [];
  const left: number[] = [];
  const right: number[] = [];
  for (let x = 0; x < width; x++) {
    top.push(pixelAt(grid, x, 0));
    bottom.push(pixelAt(grid, x, height - 1));
  }
  for (let y = 0; y < height; y++) {
    left.push(pixelAt(grid, 0, y));
    right.push(pixelAt(grid, width - 1, y));
  }
  return [top, left, bottom, right];
}

/** Map key for an edge signature; equal signatures give equal keys */
export function signatureKey(signature: EdgeSignature): string {
  return signature.join(',');
}
