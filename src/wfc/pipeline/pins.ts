import type { Coord, SeedAssignment } from '../types/index.js';
import { InvalidSeedError } from '../errors.js';
import { ROTATIONS, type Rotation } from '../layer1-tiles/tile.js';
import type { TileSet } from '../layer1-tiles/tileset.js';

/** A seed assignment named by catalog id rather than by Tile instance */
export interface PinSpec {
  coord: Coord;
  tileId: string;
  reflected: boolean;
  rotation: Rotation;
}

const PIN_PATTERN = /^(\d+),(\d+)=([^:]+)((?::r[0-3]|:m)*)$/;

/**
 * Parse `row,col=tileId[:r<0-3>][:m]`, e.g. `4,4=knots/cross` or `0,2=knots/t:r1:m`.
 */
export function parsePin(text: string): PinSpec {
  const match = PIN_PATTERN.exec(text.trim());
  if (!match) {
    throw new InvalidSeedError(`Cannot parse pin "${text}"; expected row,col=tileId[:rN][:m]`);
  }
  const [, row, col, tileId, flags] = match;
  const rotationFlag = /:r([0-3])/.exec(flags);
  return {
    coord: { row: parseInt(row, 10), col: parseInt(col, 10) },
    tileId,
    reflected: flags.includes(':m'),
    rotation: rotationFlag ? toRotation(parseInt(rotationFlag[1], 10)) : 0,
  };
}

/** Pin the untransformed variant of `tileId` at the middle cell */
export function centerPin(tileId: string, width: number, height: number): PinSpec {
  return {
    coord: { row: Math.floor(height / 2), col: Math.floor(width / 2) },
    tileId,
    reflected: false,
    rotation: 0,
  };
}

export function resolvePins(tileset: TileSet, pins: readonly PinSpec[]): SeedAssignment[] {
  return pins.map(pin => {
    const tile = tileset.findVariant(pin.tileId, pin.reflected, pin.rotation);
    if (!tile) {
      const known = tileset.tiles()
        .filter(t => t.baseId === pin.tileId)
        .map(t => `${t.reflected ? 'm' : '-'}r${t.rotation}`);
      const hint = known.length > 0 ? `available variants: ${known.join(', ')}` : 'unknown tile id';
      throw new InvalidSeedError(
        `No variant ${pin.tileId}${pin.reflected ? ':m' : ''}:r${pin.rotation} in the tile set (${hint})`,
      );
    }
    return { coord: pin.coord, tile };
  });
}

function toRotation(value: number): Rotation {
  return ROTATIONS.find(r => r === value) ?? 0;
}
