// grid.ts
// Fixed-size 2D cell grid stored row-major in a Uint8Array (1 = alive).
// Neighbor lookups follow the edge policy chosen at construction.

import { GridSizeError, OutOfBoundsError } from './errors.ts';

/** How neighbors beyond the border are treated: dead, or wrapped toroidally. */
export type EdgePolicy = 'clamp' | 'wrap';

/** Upper bound on width*height. */
export const MAX_CELLS = 1 << 24;

/** Initial state callback for each cell. */
export type CellInit = (x: number, y: number) => boolean;

/** Dimensions and edge policy, without the cell states. */
export interface GridShape {
  width: number;
  height: number;
  edge: EdgePolicy;
}

export interface GridOptions {
  edge?: EdgePolicy;
  init?: CellInit;
}

/** Relative offsets of the 8 neighbors. */
const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0], [1, 0],
  [-1, 1], [0, 1], [1, 1]
];

export function isEdgePolicy(value: unknown): value is EdgePolicy {
  return value === 'clamp' || value === 'wrap';
}

export class Grid {
  readonly width: number;
  readonly height: number;
  readonly edge: EdgePolicy;
  /**
   * Row-major cell states; index = y * width + x. Any non-zero byte is
   * alive; the grid's own writes only store 0 or 1.
   */
  readonly cells: Uint8Array;

  constructor(width: number, height: number, options: GridOptions = {}) {
    if (!Number.isInteger(width) || !Number.isInteger(height)) {
      throw new GridSizeError(width, height, 'dimensions must be integers');
    }
    if (width < 1 || height < 1) {
      throw new GridSizeError(width, height, 'dimensions must be at least 1');
    }
    if (width * height > MAX_CELLS) {
      throw new GridSizeError(width, height, `more than ${MAX_CELLS} cells`);
    }
    this.width = width;
    this.height = height;
    this.edge = options.edge ?? 'clamp';
    this.cells = new Uint8Array(width * height);
    const init = options.init;
    if (init) {
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          if (init(x, y)) this.cells[y * width + x] = 1;
        }
      }
    }
  }

  /**
   * Build a grid from an existing row-major state array.
   * @param width - Grid width.
   * @param height - Grid height.
   * @param cells - Cell states; any non-zero value is alive.
   * @param edge - Edge policy.
   * @returns New grid owning a copy of the states.
   */
  static fromCells(
    width: number,
    height: number,
    cells: ArrayLike<number | boolean>,
    edge: EdgePolicy = 'clamp'
  ): Grid {
    if (cells.length !== width * height) {
      throw new GridSizeError(width, height, `expected ${width * height} cells, got ${cells.length}`);
    }
    const grid = new Grid(width, height, { edge });
    for (let i = 0; i < cells.length; i++) {
      if (cells[i]) grid.cells[i] = 1;
    }
    return grid;
  }

  /** Total number of cells. */
  get size(): number {
    return this.cells.length;
  }

  contains(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
      x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  /**
   * Map a coordinate to its cell index.
   * @throws OutOfBoundsError when the coordinate is not on the grid.
   */
  indexOf(x: number, y: number): number {
    if (!this.contains(x, y)) {
      throw new OutOfBoundsError(x, y, this.width, this.height);
    }
    return y * this.width + x;
  }

  get(x: number, y: number): boolean {
    return this.cells[this.indexOf(x, y)] !== 0;
  }

  set(x: number, y: number, alive: boolean): void {
    this.cells[this.indexOf(x, y)] = alive ? 1 : 0;
  }

  /**
   * Flip one cell.
   * @returns The cell's new state.
   */
  toggle(x: number, y: number): boolean {
    const i = this.indexOf(x, y);
    const next = this.cells[i] !== 0 ? 0 : 1;
    this.cells[i] = next;
    return next === 1;
  }

  /**
   * Count live cells among the 8 neighbors of (x, y).
   * Clamp treats off-grid neighbors as dead; wrap reads them from the opposite edge.
   * @returns Count in 0..8.
   */
  countLiveNeighbors(x: number, y: number): number {
    this.indexOf(x, y);
    const { width, height, cells } = this;
    const wrap = this.edge === 'wrap';
    let count = 0;
    for (const [dx, dy] of NEIGHBOR_OFFSETS) {
      let nx = x + dx;
      let ny = y + dy;
      if (nx < 0 || nx >= width || ny < 0 || ny >= height) {
        if (!wrap) continue;
        nx = (nx + width) % width;
        ny = (ny + height) % height;
      }
      if (cells[ny * width + nx] !== 0) count++;
    }
    return count;
  }

  population(): number {
    let live = 0;
    for (const cell of this.cells) if (cell !== 0) live++;
    return live;
  }

  /** Coordinates of every live cell, row by row. */
  liveCells(): Array<{ x: number; y: number }> {
    const out: Array<{ x: number; y: number }> = [];
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== 0) {
        out.push({ x: i % this.width, y: Math.floor(i / this.width) });
      }
    }
    return out;
  }

  clear(): void {
    this.cells.fill(0);
  }

  shape(): GridShape {
    return { width: this.width, height: this.height, edge: this.edge };
  }

  /** True when `other` has the same dimensions and edge policy. */
  sameShape(other: Grid): boolean {
    return this.width === other.width && this.height === other.height && this.edge === other.edge;
  }

  /** True when `other` has the same shape and the same live cells. */
  equals(other: Grid): boolean {
    if (!this.sameShape(other)) return false;
    for (let i = 0; i < this.cells.length; i++) {
      if ((this.cells[i] !== 0) !== (other.cells[i] !== 0)) return false;
    }
    return true;
  }

  clone(): Grid {
    return Grid.fromCells(this.width, this.height, this.cells, this.edge);
  }

  /**
   * Overwrite this grid's states with another grid of the same shape.
   * @param other - Source grid.
   */
  copyFrom(other: Grid): void {
    if (!this.sameShape(other)) {
      throw new GridSizeError(
        other.width,
        other.height,
        `cannot copy into a ${this.width}x${this.height} ${this.edge} grid`
      );
    }
    this.cells.set(other.cells);
  }
}
