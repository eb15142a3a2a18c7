import type { Catalog, SeedAssignment, TileGrid } from '../types/index.js';
import { ContradictionError, WfcError } from '../errors.js';
import { buildTileSet, loadCatalog } from '../layer1-tiles/catalog.js';
import type { TileSet } from '../layer1-tiles/tileset.js';
import { generatePlacement } from '../layer2-wfc/generator.js';
import { createRng } from '../layer2-wfc/random.js';
import { resolvePins, type PinSpec } from './pins.js';

export interface GenerationConfig {
  catalogPath: string;
  width: number;
  height: number;
  seed: string;
  pins?: PinSpec[];
  /** Extra attempts after a contradiction, each with a derived seed */
  retries?: number;
}

export interface GenerationResult {
  catalog: Catalog;
  tileset: TileSet;
  grid: TileGrid;
  seed: string;             // seed of the attempt that succeeded
  attempts: number;
}

export interface RetryOptions {
  tileset: TileSet;
  width: number;
  height: number;
  seed: string;
  seeds?: readonly SeedAssignment[];
  retries?: number;
}

/**
 * Run the collapse, retrying on contradiction with `${seed}-${attempt}`.
 * The first attempt uses `seed` unchanged; any other error propagates at once.
 */
export function generateWithRetries(options: RetryOptions): { grid: TileGrid; seed: string; attempts: number } {
  const { tileset, width, height, seed, seeds, retries = 0 } = options;
  if (!Number.isInteger(retries) || retries < 0) {
    throw new WfcError(`Retries must be a non-negative integer, got ${retries}`);
  }

  let lastError: ContradictionError | undefined;
  for (let attempt = 0; attempt <= retries; attempt++) {
    const attemptSeed = attempt === 0 ? seed : `${seed}-${attempt}`;
    try {
      const grid = generatePlacement({ width, height, tileset, seeds, rng: createRng(attemptSeed) });
      return { grid, seed: attemptSeed, attempts: attempt + 1 };
    } catch (err) {
      if (!(err instanceof ContradictionError)) throw err;
      lastError = err;
      console.log(`[Collapse] Attempt ${attempt + 1} failed: ${err.message}`);
    }
  }

  throw lastError ?? new WfcError('No generation attempt was made');
}

export async function generateFromCatalog(config: GenerationConfig): Promise<GenerationResult> {
  const { catalogPath, width, height, seed, pins = [], retries = 0 } = config;

  console.log(`[Tiles] Loading catalog from ${catalogPath}...`);
  const catalog = await loadCatalog(catalogPath);
  const tileset = buildTileSet(catalog.entries);
  console.log(
    `[Tiles] "${catalog.name}": ${catalog.entries.length} base tiles -> ${tileset.size} variants `
    + `(${tileset.tileWidth}x${tileset.tileHeight} px)`,
  );

  const seeds = resolvePins(tileset, pins);
  console.log(`[Collapse] Filling ${width}x${height} grid (seed: "${seed}", pins: ${seeds.length})...`);
  const result = generateWithRetries({ tileset, width, height, seed, seeds, retries });
  console.log(`[Collapse] Placed ${result.grid.tiles.length} tiles in ${result.attempts} attempt(s)`);

  return { catalog, tileset, ...result };
}
