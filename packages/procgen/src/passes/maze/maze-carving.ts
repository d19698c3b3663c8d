/**
 * Maze interiors for qualifying rooms.
 */

import {
  type Configuration,
  chance,
  type RandomSource,
  shuffleInPlace,
} from "@delve/contracts";
import { UnionFind } from "../../core/algorithms/union-find";
import type { Rect } from "../../core/geometry/types";
import type { Grid } from "../../core/grid/grid";
import { Tile } from "../../core/grid/types";
import type { Dungeon } from "../../pipeline/types";

/**
 * Wall between two adjacent maze cells, with the tile that separates them.
 */
interface MazeEdge {
  readonly a: number;
  readonly b: number;
  readonly wallX: number;
  readonly wallY: number;
}

/**
 * Whether forcing WALL at (x, y) would cut off a doorway.
 */
function guardsDoorway(grid: Grid, x: number, y: number): boolean {
  return (
    grid.get(x, y) === Tile.DOORWAY ||
    grid.get(x + 1, y) === Tile.DOORWAY ||
    grid.get(x - 1, y) === Tile.DOORWAY ||
    grid.get(x, y + 1) === Tile.DOORWAY ||
    grid.get(x, y - 1) === Tile.DOORWAY
  );
}

function placeWall(grid: Grid, x: number, y: number): void {
  if (!guardsDoorway(grid, x, y)) {
    grid.set(x, y, Tile.WALL);
  }
}

/**
 * Overlay a perfect maze on one room.
 *
 * The interior is split into 2x2 cells whose top-left tile is the passage.
 * A cell's right column and bottom row hold the walls towards its east and
 * south neighbours, and the bottom-right tile is a pillar. Randomised
 * Kruskal over the shuffled cell edges picks which walls to open; every
 * other wall and every pillar becomes WALL. An even side has no passage
 * in its last column or row, so that line is walled off entirely.
 */
export function carveMaze(rng: RandomSource, grid: Grid, bounds: Rect): void {
  const { x, y, width, height } = bounds;
  const columns = Math.ceil(width / 2);
  const rows = Math.ceil(height / 2);
  const cell = (i: number, j: number): number => j * columns + i;

  const edges: MazeEdge[] = [];
  for (let j = 0; j < rows; j++) {
    for (let i = 0; i < columns; i++) {
      if (i + 1 < columns) {
        edges.push({
          a: cell(i, j),
          b: cell(i + 1, j),
          wallX: x + 2 * i + 1,
          wallY: y + 2 * j,
        });
      }
      if (j + 1 < rows) {
        edges.push({
          a: cell(i, j),
          b: cell(i, j + 1),
          wallX: x + 2 * i,
          wallY: y + 2 * j + 1,
        });
      }
    }
  }

  shuffleInPlace(rng, edges);

  const sets = new UnionFind(columns * rows);
  for (const edge of edges) {
    if (!sets.union(edge.a, edge.b)) {
      placeWall(grid, edge.wallX, edge.wallY);
    }
  }

  for (let j = 0; 2 * j + 1 < height; j++) {
    for (let i = 0; 2 * i + 1 < width; i++) {
      placeWall(grid, x + 2 * i + 1, y + 2 * j + 1);
    }
  }

  if (width % 2 === 0) {
    for (let row = y; row < y + height; row++) {
      placeWall(grid, x + width - 1, row);
    }
  }
  if (height % 2 === 0) {
    for (let column = x; column < x + width; column++) {
      placeWall(grid, column, y + height - 1);
    }
  }
}

/**
 * Give each room with both sides at least `minMazeDimension` a maze with
 * probability `mazeChance`. Edits `grid` in place.
 *
 * @returns Indices of the rooms that received a maze
 */
export function makeMazes(
  rng: RandomSource,
  config: Configuration,
  grid: Grid,
  dungeon: Dungeon,
): number[] {
  const mazeRooms: number[] = [];

  dungeon.rooms.forEach((room, index) => {
    const { width, height } = room.bounds;
    if (width < config.minMazeDimension || height < config.minMazeDimension) {
      return;
    }
    if (!chance(rng, config.mazeChance)) return;

    carveMaze(rng, grid, room.bounds);
    mazeRooms.push(index);
  });

  return mazeRooms;
}
