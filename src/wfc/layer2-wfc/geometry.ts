import type { Coord } from '../types/index.js';
import { InvalidGridError } from '../errors.js';
import { Side } from '../layer1-tiles/tileset.js';

export interface Neighbor {
  side: Side;        // edge of the origin cell facing this neighbor
  index: number;     // row-major cell index
}

const OFFSETS: ReadonlyArray<{ side: Side; dRow: number; dCol: number }> = [
  { side: Side.TOP, dRow: -1, dCol: 0 },
  { side: Side.LEFT, dRow: 0, dCol: -1 },
  { side: Side.BOTTOM, dRow: 1, dCol: 0 },
  { side: Side.RIGHT, dRow: 0, dCol: 1 },
];

export function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new InvalidGridError(`Grid dimensions must be positive integers, got ${width}x${height}`);
  }
}

export function inBounds(coord: Coord, width: number, height: number): boolean {
  return Number.isInteger(coord.row) && Number.isInteger(coord.col)
    && coord.row >= 0 && coord.row < height && coord.col >= 0 && coord.col < width;
}

export function toIndex(coord: Coord, width: number): number {
  return coord.row * width + coord.col;
}

export function toCoord(index: number, width: number): Coord {
  return { row: Math.floor(index / width), col: index % width };
}

export function formatCoord(coord: Coord): string {
  return `(${coord.row}, ${coord.col})`;
}

/** In-bounds neighbors of a cell, in side order */
export function neighbors(index: number, width: number, height: number): Neighbor[] {
  const row = Math.floor(index / width);
  const col = index % width;
  const result: Neighbor[] = [];
  for (const { side, dRow, dCol } of OFFSETS) {
    const r = row + dRow;
    const c = col + dCol;
    if (r >= 0 && r < height && c >= 0 && c < width) {
      result.push({ side, index: r * width + c });
    }
  }
  return result;
}
