import sharp from 'sharp';
import type { PixelGrid } from '../types/index.js';
import { createPixelGrid, packRgba } from './pixel-grid.js';

/** Pack an interleaved 8-bit RGBA buffer into a PixelGrid */
export function rgbaToPixelGrid(buffer: Uint8Array, width: number, height: number): PixelGrid {
  if (buffer.length !== width * height * 4) {
    throw new RangeError(`Expected ${width * height * 4} bytes of RGBA, got ${buffer.length}`);
  }
  const grid = createPixelGrid(width, height);
  for (let i = 0; i < width * height; i++) {
    const o = i * 4;
    grid.data[i] = packRgba(buffer[o], buffer[o + 1], buffer[o + 2], buffer[o + 3]);
  }
  return grid;
}

/**
 * Decode any image sharp understands (PNG, GIF, WebP, ...) into packed RGBA.
 */
export async function decodeImage(path: string): Promise<PixelGrid> {
  const { data, info } = await sharp(path)
    .toColourspace('srgb')
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== 4) {
    throw new Error(`Decoded ${path} with ${info.channels} channels, expected 4`);
  }
  return rgbaToPixelGrid(data, info.width, info.height);
}
