import type { BaseTile } from '../types/index.js';
import { DimensionMismatchError, InvalidWeightError, UnknownTileError } from '../errors.js';
import { signatureKey, type EdgeSignature } from './pixel-grid.js';
import { canonicalVariants, compareTiles, type Tile } from './tile.js';

export const Side = {
  TOP: 0,
  LEFT: 1,
  BOTTOM: 2,
  RIGHT: 3,
} as const;

export type Side = (typeof Side)[keyof typeof Side];

export const SIDES: readonly Side[] = [Side.TOP, Side.LEFT, Side.BOTTOM, Side.RIGHT];

/** The side of a neighbouring tile that touches `side` of this one */
export function opposite(side: Side): Side {
  return SIDES[(side + 2) % 4];
}

/**
 * Canonical tile catalog with per-variant weights and, for each side,
 * an index from edge signature to the tiles presenting it there.
 */
export class TileSet {
  private readonly weights = new Map<string, number>();
  private readonly byKey = new Map<string, Tile>();
  private readonly borderMap: Map<string, Set<Tile>>[] = SIDES.map(() => new Map());
  private width: number | null = null;
  private height: number | null = null;

  get size(): number {
    return this.byKey.size;
  }

  get tileWidth(): number | null {
    return this.width;
  }

  get tileHeight(): number | null {
    return this.height;
  }

  /**
   * Canonicalize a base tile and register its variants, splitting `weight`
   * evenly between them. Adding the same base id again replaces it.
   */
  addTile(base: BaseTile, weight: number): Tile[] {
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new InvalidWeightError(base.id, weight);
    }
    const { width, height } = base.pixels;
    // Quarter turns swap width and height, so the first tile must be square.
    const expected = { width: this.width ?? width, height: this.height ?? width };
    if (width !== expected.width || height !== expected.height) {
      throw new DimensionMismatchError(base.id, expected, { width, height });
    }
    this.width = width;
    this.height = height;

    this.removeBase(base.id);
    const variants = canonicalVariants(base);
    for (const tile of variants) {
      this.byKey.set(tile.key, tile);
      this.weights.set(tile.key, weight / variants.length);
      for (const side of SIDES) {
        const key = signatureKey(tile.signatures[side]);
        let bucket = this.borderMap[side].get(key);
        if (!bucket) {
          bucket = new Set();
          this.borderMap[side].set(key, bucket);
        }
        bucket.add(tile);
      }
    }
    return variants;
  }

  getWeight(tile: Tile): number {
    const weight = this.weights.get(tile.key);
    if (weight === undefined) throw new UnknownTileError(tile.key);
    return weight;
  }

  has(tile: Tile): boolean {
    return this.byKey.has(tile.key);
  }

  /** The registered instance sharing `tile`'s identity */
  canonical(tile: Tile): Tile {
    const found = this.byKey.get(tile.key);
    if (!found) throw new UnknownTileError(tile.key);
    return found;
  }

  findVariant(baseId: string, reflected: boolean, rotation: number): Tile | undefined {
    return this.tiles().find(
      t => t.baseId === baseId && t.reflected === reflected && t.rotation === rotation,
    );
  }

  /** Tiles presenting `signature` on `side`. The returned set is the caller's to mutate. */
  matchBorder(signature: EdgeSignature, side: Side): Set<Tile> {
    return new Set(this.borderMap[side].get(signatureKey(signature)));
  }

  tiles(): Tile[] {
    return [...this.byKey.values()].sort(compareTiles);
  }

  private removeBase(baseId: string): void {
    for (const [key, tile] of this.byKey) {
      if (tile.baseId !== baseId) continue;
      this.byKey.delete(key);
      this.weights.delete(key);
      for (const side of SIDES) {
        const sigKey = signatureKey(tile.signatures[side]);
        const bucket = this.borderMap[side].get(sigKey);
        bucket?.delete(tile);
        if (bucket?.size === 0) this.borderMap[side].delete(sigKey);
      }
    }
  }
}
