import type { SeedAssignment, TileGrid } from '../types/index.js';
import type { TileSet } from '../layer1-tiles/tileset.js';
import { CollapseEngine } from './collapse-engine.js';
import type { Rng } from './random.js';

export interface GenerateOptions {
  width: number;
  height: number;
  tileset: TileSet;
  /** Pins applied in order before collapse; a random tile at (0, 0) when empty */
  seeds?: readonly SeedAssignment[];
  rng: Rng;
}

/**
 * Fill a width x height grid so every pair of adjacent tiles shares an edge.
 * Throws ContradictionError if some cell runs out of candidates; there is no
 * backtracking, so callers retry with another seed if they want one.
 */
export function generatePlacement(options: GenerateOptions): TileGrid {
  const { width, height, tileset, seeds = [], rng } = options;
  const engine = new CollapseEngine({ tileset, width, height, rng });
  return engine.run(seeds);
}
