import type { Coord, SeedAssignment, TileGrid } from '../types/index.js';
import {
  ContradictionError,
  EngineFailedError,
  InvalidSeedError,
  WfcError,
} from '../errors.js';
import { compareTiles, type Tile } from '../layer1-tiles/tile.js';
import { opposite, type TileSet } from '../layer1-tiles/tileset.js';
import { assertDimensions, formatCoord, inBounds, neighbors, toCoord, toIndex } from './geometry.js';
import { uniformChoice, weightedChoice, type Rng } from './random.js';

export interface CollapseEngineOptions {
  tileset: TileSet;
  width: number;
  height: number;
  rng: Rng;
  /** Called whenever a frontier cell's candidate set is created or narrowed */
  onFrontierChange?: (coord: Coord, size: number) => void;
}

/**
 * One generation run. Cells move from untouched to the frontier when a
 * neighbor is placed, and from the frontier to placed when resolved.
 * Candidate sets only ever shrink; an empty set aborts the run.
 */
export class CollapseEngine {
  readonly width: number;
  readonly height: number;
  private readonly tileset: TileSet;
  private readonly rng: Rng;
  private readonly onFrontierChange?: (coord: Coord, size: number) => void;
  private readonly placed = new Map<number, Tile>();
  private readonly frontier = new Map<number, Set<Tile>>();
  private failed = false;

  constructor(options: CollapseEngineOptions) {
    assertDimensions(options.width, options.height);
    if (options.tileset.size === 0) {
      throw new WfcError('Cannot collapse with an empty tile set');
    }
    this.width = options.width;
    this.height = options.height;
    this.tileset = options.tileset;
    this.rng = options.rng;
    this.onFrontierChange = options.onFrontierChange;
  }

  get cellCount(): number {
    return this.width * this.height;
  }

  get placedCount(): number {
    return this.placed.size;
  }

  get frontierSize(): number {
    return this.frontier.size;
  }

  get hasFailed(): boolean {
    return this.failed;
  }

  isComplete(): boolean {
    return this.placed.size === this.cellCount;
  }

  tileAt(coord: Coord): Tile | undefined {
    return this.placed.get(toIndex(coord, this.width));
  }

  candidatesAt(coord: Coord): ReadonlySet<Tile> | undefined {
    return this.frontier.get(toIndex(coord, this.width));
  }

  /**
   * Pin `tile` at `coord` and narrow the candidates of every unplaced neighbor
   * to the tiles whose facing edge matches.
   */
  place(coord: Coord, tile: Tile): void {
    this.ensureUsable();
    if (!inBounds(coord, this.width, this.height)) {
      throw new InvalidSeedError(`${formatCoord(coord)} is outside the ${this.width}x${this.height} grid`);
    }
    const index = toIndex(coord, this.width);
    if (this.placed.has(index)) {
      throw new InvalidSeedError(`${formatCoord(coord)} is already placed`);
    }
    this.placeIndex(index, this.tileset.canonical(tile));
  }

  /** Most constrained frontier cell; ties go to the first cell in row-major order */
  selectNext(): Coord | null {
    const index = this.selectIndex();
    return index === null ? null : toCoord(index, this.width);
  }

  /** Resolve one cell by weighted choice. Returns null once the grid is full. */
  step(): Coord | null {
    this.ensureUsable();
    if (this.isComplete()) return null;

    const index = this.selectIndex();
    // The grid is connected, so an empty frontier means nothing is placed yet.
    if (index === null) throw new WfcError('Nothing has been placed; pin a tile first');
    const candidates = [...(this.frontier.get(index) ?? [])].sort(compareTiles);
    const weights = candidates.map(t => this.tileset.getWeight(t));
    this.placeIndex(index, weightedChoice(candidates, weights, this.rng));
    return toCoord(index, this.width);
  }

  /**
   * Apply the seeds in order, then resolve cells until the grid is full.
   * Without seeds a uniformly chosen tile is pinned at (0, 0).
   */
  run(seeds: readonly SeedAssignment[] = []): TileGrid {
    const pins = seeds.length > 0
      ? seeds
      : [{ coord: { row: 0, col: 0 }, tile: uniformChoice(this.tileset.tiles(), this.rng) }];

    for (const { coord, tile } of pins) {
      this.place(coord, tile);
    }
    while (!this.isComplete()) {
      this.step();
    }
    return this.toGrid();
  }

  toGrid(): TileGrid {
    const tiles: Tile[] = [];
    for (let i = 0; i < this.cellCount; i++) {
      const tile = this.placed.get(i);
      if (!tile) {
        throw new WfcError(`Cell ${formatCoord(toCoord(i, this.width))} has not been placed`);
      }
      tiles.push(tile);
    }
    return { width: this.width, height: this.height, tiles };
  }

  private placeIndex(index: number, tile: Tile): void {
    this.placed.set(index, tile);
    this.frontier.delete(index);

    for (const { side, index: next } of neighbors(index, this.width, this.height)) {
      if (this.placed.has(next)) continue;
      const valid = this.tileset.matchBorder(tile.signatures[side], opposite(side));
      const existing = this.frontier.get(next);
      let candidates: Set<Tile>;
      if (existing) {
        for (const t of existing) {
          if (!valid.has(t)) existing.delete(t);
        }
        candidates = existing;
      } else {
        candidates = valid;
        this.frontier.set(next, candidates);
      }
      const coord = toCoord(next, this.width);
      this.onFrontierChange?.(coord, candidates.size);
      if (candidates.size === 0) {
        this.failed = true;
        throw new ContradictionError(coord);
      }
    }
  }

  private selectIndex(): number | null {
    let best: number | null = null;
    let bestSize = Infinity;
    for (const [index, candidates] of this.frontier) {
      if (candidates.size < bestSize || (candidates.size === bestSize && best !== null && index < best)) {
        best = index;
        bestSize = candidates.size;
      }
    }
    return best;
  }

  private ensureUsable(): void {
    if (this.failed) throw new EngineFailedError();
  }
}
