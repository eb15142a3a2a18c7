import type { Coord } from './types/index.js';

export class WfcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A tile's pixel size differs from the tiles already in the set, or is not square */
export class DimensionMismatchError extends WfcError {
  constructor(
    readonly tileId: string,
    readonly expected: { width: number; height: number },
    readonly actual: { width: number; height: number },
  ) {
    super(
      `Tile "${tileId}" is ${actual.width}x${actual.height}, expected ${expected.width}x${expected.height}`,
    );
  }
}

/** A frontier cell ran out of candidates during propagation */
export class ContradictionError extends WfcError {
  constructor(readonly coord: Coord) {
    super(`Constraint failure at (${coord.row}, ${coord.col})`);
  }
}

export class UnknownTileError extends WfcError {
  constructor(readonly tileKey: string) {
    super(`Tile ${tileKey} is not part of the tile set`);
  }
}

export class InvalidWeightError extends WfcError {
  constructor(readonly tileId: string, readonly weight: number) {
    super(`Tile "${tileId}" has invalid weight ${weight}; weights must be positive`);
  }
}

export class InvalidGridError extends WfcError {}

export class InvalidSeedError extends WfcError {}

/** Raised when a run that already failed is used again */
export class EngineFailedError extends WfcError {
  constructor() {
    super('Collapse run has already failed and cannot be reused');
  }
}

export class CatalogError extends WfcError {
  constructor(readonly source: string, detail: string) {
    super(`Invalid catalog ${source}: ${detail}`);
  }
}
