import type { BaseTile } from './tile-grid.js';

export interface CatalogEntry {
  base: BaseTile;
  weight: number;
}

export interface Catalog {
  name: string;
  tileSize: number;         // pixel pitch used when rasterizing
  entries: CatalogEntry[];
}
