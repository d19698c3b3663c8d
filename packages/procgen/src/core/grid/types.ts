/**
 * Grid types for dungeon generation.
 */

/**
 * Tile kinds stored one byte per cell.
 *
 * - `BLOCKER`: permanently impassable (map border, ring around rooms)
 * - `WALL`: carvable filler
 * - `CORRIDOR_NEIGHBOR`: wall beside a corridor that must not become a
 *   second, parallel corridor
 */
export const Tile = {
  BLOCKER: 0,
  WALL: 1,
  ROOM: 2,
  DOORWAY: 3,
  CORRIDOR: 4,
  CORRIDOR_NEIGHBOR: 5,
  EMPTY: 6,
} as const;

export type Tile = (typeof Tile)[keyof typeof Tile];

/**
 * Narrow a raw byte to a tile. Unknown bytes read as `EMPTY`.
 */
export function toTile(value: number | undefined): Tile {
  switch (value) {
    case Tile.BLOCKER:
      return Tile.BLOCKER;
    case Tile.WALL:
      return Tile.WALL;
    case Tile.ROOM:
      return Tile.ROOM;
    case Tile.DOORWAY:
      return Tile.DOORWAY;
    case Tile.CORRIDOR:
      return Tile.CORRIDOR;
    case Tile.CORRIDOR_NEIGHBOR:
      return Tile.CORRIDOR_NEIGHBOR;
    default:
      return Tile.EMPTY;
  }
}

/**
 * Read-only grid interface.
 *
 * Use this type when a function only needs to read from a grid.
 */
export interface ReadonlyGrid {
  readonly width: number;
  readonly height: number;

  isInBounds(x: number, y: number): boolean;
  get(x: number, y: number): Tile;
  getIndex(index: number): Tile;
  countTiles(tile: Tile): number;
  getRawDataCopy(): Uint8Array;
}
