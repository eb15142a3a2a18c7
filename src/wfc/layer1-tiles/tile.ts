import type { BaseTile, PixelGrid } from '../types/index.js';
import { edgeSignatures, pixelsEqual, transformPixels, type EdgeSignatures } from './pixel-grid.js';

export type Rotation = 0 | 1 | 2 | 3;

export const ROTATIONS: readonly Rotation[] = [0, 1, 2, 3];

/**
 * One symmetry variant of a base tile. Identity is (baseId, reflected, rotation);
 * the transformed pixels and edge signatures are derived from it.
 */
export class Tile {
  readonly baseId: string;
  readonly reflected: boolean;
  readonly rotation: Rotation;
  readonly pixels: Readonly<PixelGrid>;
  readonly signatures: EdgeSignatures;
  readonly key: string;

  constructor(base: BaseTile, reflected: boolean, rotation: Rotation) {
    this.baseId = base.id;
    this.reflected = reflected;
    this.rotation = rotation;
    this.pixels = Object.freeze(transformPixels(base.pixels, reflected, rotation));
    this.signatures = edgeSignatures(this.pixels);
    this.key = tileKey(base.id, reflected, rotation);
    Object.freeze(this);
  }

  get width(): number {
    return this.pixels.width;
  }

  get height(): number {
    return this.pixels.height;
  }

  equals(other: Tile): boolean {
    return compareTiles(this, other) === 0;
  }

  toString(): string {
    return `Tile(${this.key})`;
  }
}

export function tileKey(baseId: string, reflected: boolean, rotation: Rotation): string {
  return `${baseId}|${reflected ? 'm' : '-'}|r${rotation}`;
}

/** Orders by base id, then unreflected before reflected, then rotation */
export function compareTiles(a: Tile, b: Tile): number {
  if (a.baseId !== b.baseId) return a.baseId < b.baseId ? -1 : 1;
  if (a.reflected !== b.reflected) return a.reflected ? 1 : -1;
  return a.rotation - b.rotation;
}

/**
 * Enumerate the 8 rotation/reflection variants of a base tile, dropping any whose
 * pixels repeat an earlier variant. Survivors come back in identity order.
 */
export function canonicalVariants(base: BaseTile): Tile[] {
  const variants: Tile[] = [];
  for (const reflected of [false, true]) {
    for (const rotation of ROTATIONS) {
      const tile = new Tile(base, reflected, rotation);
      if (variants.some(seen => pixelsEqual(seen.pixels, tile.pixels))) continue;
      variants.push(tile);
    }
  }
  return variants.sort(compareTiles);
}
