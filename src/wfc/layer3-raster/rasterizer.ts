import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import sharp from 'sharp';
import type { TileGrid } from '../types/index.js';
import { unpackRgba } from '../layer1-tiles/pixel-grid.js';

export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8Array;         // interleaved RGBA, row-major
}

/**
 * Blit every tile's transformed pixels into one image at a fixed pitch.
 * Tiles larger than the pitch are clipped; uncovered pixels stay transparent.
 */
export function rasterize(grid: TileGrid, tileSize: number): RgbaImage {
  if (!Number.isInteger(tileSize) || tileSize < 1) {
    throw new RangeError(`Tile size must be a positive integer, got ${tileSize}`);
  }
  const width = grid.width * tileSize;
  const height = grid.height * tileSize;
  const data = new Uint8Array(width * height * 4);

  grid.tiles.forEach((tile, i) => {
    const originX = (i % grid.width) * tileSize;
    const originY = Math.floor(i / grid.width) * tileSize;
    const w = Math.min(tile.width, tileSize);
    const h = Math.min(tile.height, tileSize);
    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        const o = ((originY + y) * width + originX + x) * 4;
        data.set(unpackRgba(tile.pixels.data[y * tile.width + x]), o);
      }
    }
  });

  return { width, height, data };
}

/** Rasterize and encode as PNG at `path`, creating parent directories */
export async function writePng(grid: TileGrid, path: string, tileSize: number): Promise<RgbaImage> {
  const image = rasterize(grid, tileSize);
  await mkdir(dirname(path), { recursive: true });
  await sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: 4 },
  }).png().toFile(path);
  return image;
}
