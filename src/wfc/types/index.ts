export type {
  PixelGrid,
  BaseTile,
  Coord,
  SeedAssignment,
  TileGrid,
} from './tile-grid.js';

export type {
  CatalogEntry,
  Catalog,
} from './catalog.js';
