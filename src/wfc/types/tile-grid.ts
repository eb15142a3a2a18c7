import type { Tile } from '../layer1-tiles/tile.js';

/** Row-major pixel raster, one packed RGBA value (r<<24 | g<<16 | b<<8 | a) per pixel */
export interface PixelGrid {
  width: number;
  height: number;
  data: Uint32Array;
}

/** A catalog image before canonicalization */
export interface BaseTile {
  id: string;               // catalog identifier, e.g. 'knots/corner.png'
  pixels: PixelGrid;
}

export interface Coord {
  row: number;
  col: number;
}

/** Pins a tile to a cell before collapse starts */
export interface SeedAssignment {
  coord: Coord;
  tile: Tile;
}

export interface TileGrid {
  width: number;            // cells horizontally
  height: number;           // cells vertically
  tiles: Tile[];            // flat 2D array, row-major
}
