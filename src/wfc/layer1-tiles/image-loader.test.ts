import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { decodeImage, rgbaToPixelGrid } from './image-loader.js';
import { buildTileSet, loadCatalog } from './catalog.js';
import { packRgba } from './pixel-grid.js';
import { Tile } from './tile.js';
import { writePng } from '../layer3-raster/rasterizer.js';

const RED = packRgba(255, 0, 0, 255);
const GREEN = packRgba(0, 255, 0, 255);
const BLUE = packRgba(0, 0, 255, 255);
const WHITE = packRgba(255, 255, 255, 255);

// red green / blue white
const QUAD = Buffer.from([
  255, 0, 0, 255, 0, 255, 0, 255,
  0, 0, 255, 255, 255, 255, 255, 255,
]);

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'tile-collapse-'));
  await sharp(QUAD, { raw: { width: 2, height: 2, channels: 4 } }).png().toFile(join(dir, 'quad.png'));
  await writeFile(
    join(dir, 'quads.json'),
    JSON.stringify({ name: 'quads', tiles: [{ id: 'quad', weight: 2, file: 'quad.png' }] }),
  );
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('rgbaToPixelGrid', () => {
  it('packs interleaved bytes row-major', () => {
    const grid = rgbaToPixelGrid(QUAD, 2, 2);
    expect(grid.width).toBe(2);
    expect(grid.height).toBe(2);
    expect([...grid.data]).toEqual([RED, GREEN, BLUE, WHITE]);
  });

  it('rejects a buffer of the wrong length', () => {
    expect(() => rgbaToPixelGrid(QUAD, 3, 2)).toThrow('Expected 24 bytes of RGBA, got 16');
  });
});

describe('decodeImage', () => {
  it('decodes a PNG into packed RGBA', async () => {
    const grid = await decodeImage(join(dir, 'quad.png'));
    expect(grid.width).toBe(2);
    expect(grid.height).toBe(2);
    expect([...grid.data]).toEqual([RED, GREEN, BLUE, WHITE]);
  });

  it('adds an opaque alpha channel to RGB images', async () => {
    const rgb = Buffer.from([10, 20, 30, 40, 50, 60]);
    const path = join(dir, 'rgb.png');
    await sharp(rgb, { raw: { width: 2, height: 1, channels: 3 } }).png().toFile(path);
    const grid = await decodeImage(path);
    expect([...grid.data]).toEqual([packRgba(10, 20, 30, 255), packRgba(40, 50, 60, 255)]);
  });
});

describe('image-backed catalogs', () => {
  it('loads tiles from files beside the catalog', async () => {
    const catalog = await loadCatalog(join(dir, 'quads.json'));
    expect(catalog.tileSize).toBe(2);
    expect([...catalog.entries[0].base.pixels.data]).toEqual([RED, GREEN, BLUE, WHITE]);

    // four distinct colours: every rotation and reflection survives
    const tileset = buildTileSet(catalog.entries);
    expect(tileset.size).toBe(8);
    expect(tileset.getWeight(tileset.tiles()[0])).toBe(0.25);
  });

  it('writes a placement that decodes back to the same pixels', async () => {
    const catalog = await loadCatalog(join(dir, 'quads.json'));
    const base = catalog.entries[0].base;
    const grid = {
      width: 2,
      height: 1,
      tiles: [new Tile(base, false, 0), new Tile(base, false, 1)],
    };
    const out = join(dir, 'nested', 'out.png');

    const image = await writePng(grid, out, catalog.tileSize);
    expect(image.width).toBe(4);
    expect(image.height).toBe(2);

    const decoded = await decodeImage(out);
    expect(decoded.width).toBe(4);
    expect(decoded.height).toBe(2);
    // second tile is a quarter turn: green white / red blue
    expect([...decoded.data]).toEqual([
      RED, GREEN, GREEN, WHITE,
      BLUE, WHITE, RED, BLUE,
    ]);
  });
});
