/**
 * Tile grid backed by a flat row-major Uint8Array.
 */

import type { Dimensions, Rect } from "../geometry/types";
import { type ReadonlyGrid, Tile, toTile } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * 2D tile grid.
 *
 * Cells are addressed either by `(x, y)` or by the flat index
 * `y * width + x`. Carving relies on the one-cell `BLOCKER` margin kept
 * around the map and every room, so its neighbour lookups use the
 * unchecked index accessors.
 */
export class Grid implements ReadonlyGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;

  constructor(width: number, height: number, initialValue: Tile = Tile.WALL) {
    if (width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height);
    this.data.fill(initialValue);
  }

  static fromDimensions(dim: Dimensions, initialValue: Tile = Tile.WALL): Grid {
    return new Grid(dim.width, dim.height, initialValue);
  }

  /**
   * Build a grid from a tile list. Missing cells stay `EMPTY`.
   */
  static fromTiles(width: number, height: number, tiles: readonly Tile[]): Grid {
    const grid = new Grid(width, height, Tile.EMPTY);
    const count = Math.min(tiles.length, width * height);
    for (let i = 0; i < count; i++) {
      grid.data[i] = tiles[i] ?? Tile.EMPTY;
    }
    return grid;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  get size(): number {
    return this.data.length;
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  /**
   * Get tile with bounds checking (returns BLOCKER for out of bounds)
   */
  get(x: number, y: number): Tile {
    if (!this.isInBounds(x, y)) return Tile.BLOCKER;
    return toTile(this.data[y * this.width + x]);
  }

  /**
   * Set tile with bounds checking
   */
  set(x: number, y: number, value: Tile): void {
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `Grid.set: out of bounds (${x}, ${y}) for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    this.data[y * this.width + x] = value;
  }

  /**
   * Get tile by flat index. Out-of-range indices read as BLOCKER.
   */
  getIndex(index: number): Tile {
    const value = this.data[index];
    return value === undefined ? Tile.BLOCKER : toTile(value);
  }

  /**
   * Set tile by flat index, no bounds check. Writes past the end are
   * dropped by the typed array.
   */
  setIndex(index: number, value: Tile): void {
    this.data[index] = value;
  }

  // ===========================================================================
  // BULK OPERATIONS
  // ===========================================================================

  /**
   * Fill a rectangle, clipped to the grid
   */
  fillRect(r: Rect, value: Tile): void {
    const x0 = Math.max(0, r.x);
    const y0 = Math.max(0, r.y);
    const x1 = Math.min(this.width, r.x + r.width);
    const y1 = Math.min(this.height, r.y + r.height);

    for (let y = y0; y < y1; y++) {
      const row = y * this.width;
      this.data.fill(value, row + x0, row + x1);
    }
  }

  /**
   * Stamp the one-cell outline of a rectangle, clipped to the grid
   */
  strokeRect(r: Rect, value: Tile): void {
    const right = r.x + r.width - 1;
    const bottom = r.y + r.height - 1;

    for (let x = r.x; x <= right; x++) {
      this.set(x, r.y, value);
      this.set(x, bottom, value);
    }
    for (let y = r.y + 1; y < bottom; y++) {
      this.set(r.x, y, value);
      this.set(right, y, value);
    }
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  clone(): Grid {
    const copy = new Grid(this.width, this.height, Tile.EMPTY);
    copy.data.set(this.data);
    return copy;
  }

  /**
   * Overwrite this grid's cells with another grid of the same size
   */
  copyFrom(other: Grid): void {
    if (other.width !== this.width || other.height !== this.height) {
      throw new Error(
        `Grid.copyFrom: size mismatch ${other.width}x${other.height} vs ${this.width}x${this.height}`,
      );
    }
    this.data.set(other.data);
  }

  countTiles(tile: Tile): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === tile) count++;
    }
    return count;
  }

  equals(other: Grid): boolean {
    if (other.width !== this.width || other.height !== this.height) {
      return false;
    }
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== other.data[i]) return false;
    }
    return true;
  }

  getRawDataCopy(): Uint8Array {
    return new Uint8Array(this.data);
  }
}
