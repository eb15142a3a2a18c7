import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { z } from 'zod';
import type { Catalog, CatalogEntry, PixelGrid } from '../types/index.js';
import { CatalogError } from '../errors.js';
import { decodeImage } from './image-loader.js';
import { createPixelGrid, packRgba } from './pixel-grid.js';
import { TileSet } from './tileset.js';

const ChannelSchema = z.number().int().min(0).max(255);

export const RgbaSchema = z.tuple([ChannelSchema, ChannelSchema, ChannelSchema, ChannelSchema]);

export const CatalogTileSchema = z
  .object({
    id: z.string().min(1),
    weight: z.number().positive(),
    file: z.string().min(1).optional(),
    rows: z.array(z.string().min(1)).min(1).optional(),
  })
  .refine(tile => (tile.file === undefined) !== (tile.rows === undefined), {
    message: 'a tile needs exactly one of "file" or "rows"',
  });

export const CatalogFileSchema = z.object({
  name: z.string().min(1),
  tileSize: z.number().int().positive().optional(),
  palette: z.record(z.string().length(1), RgbaSchema).default({}),
  tiles: z.array(CatalogTileSchema).min(1).superRefine((tiles, ctx) => {
    const seen = new Set<string>();
    tiles.forEach((tile, i) => {
      if (seen.has(tile.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'id'],
          message: `duplicate tile id "${tile.id}"`,
        });
      }
      seen.add(tile.id);
    });
  }),
});

export type CatalogFile = z.infer<typeof CatalogFileSchema>;

export function parseCatalog(json: unknown, source: string): CatalogFile {
  const result = CatalogFileSchema.safeParse(json);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CatalogError(source, detail);
  }
  return result.data;
}

/**
 * Turn glyph rows into pixels, one character per pixel, colored through the palette.
 */
export function glyphsToPixels(
  rows: readonly string[],
  palette: Readonly<Record<string, readonly number[]>>,
  source: string,
): PixelGrid {
  const width = rows[0].length;
  const grid = createPixelGrid(width, rows.length);
  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new CatalogError(source, `row ${y} has ${row.length} glyphs, expected ${width}`);
    }
    for (let x = 0; x < width; x++) {
      const color = palette[row[x]];
      if (!color) {
        throw new CatalogError(source, `glyph "${row[x]}" at row ${y} is not in the palette`);
      }
      grid.data[y * width + x] = packRgba(color[0], color[1], color[2], color[3]);
    }
  });
  return grid;
}

/**
 * Read a catalog JSON file. Image files are resolved relative to the catalog.
 */
export async function loadCatalog(path: string): Promise<Catalog> {
  const text = await readFile(path, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new CatalogError(path, err instanceof Error ? err.message : String(err));
  }
  const file = parseCatalog(json, path);
  const baseDir = dirname(resolve(path));

  const entries: CatalogEntry[] = [];
  for (const tile of file.tiles) {
    const pixels = await tilePixels(tile, file.palette, baseDir, path);
    entries.push({ base: { id: tile.id, pixels }, weight: tile.weight });
  }

  return {
    name: file.name,
    tileSize: file.tileSize ?? entries[0].base.pixels.width,
    entries,
  };
}

async function tilePixels(
  tile: CatalogFile['tiles'][number],
  palette: CatalogFile['palette'],
  baseDir: string,
  source: string,
): Promise<PixelGrid> {
  if (tile.rows) return glyphsToPixels(tile.rows, palette, `${source}#${tile.id}`);
  if (tile.file) return decodeImage(resolve(baseDir, tile.file));
  throw new CatalogError(source, `tile "${tile.id}" has no pixels`);
}

/** Register catalog entries in order */
export function buildTileSet(entries: readonly CatalogEntry[]): TileSet {
  const tileset = new TileSet();
  for (const { base, weight } of entries) {
    tileset.addTile(base, weight);
  }
  return tileset;
}
