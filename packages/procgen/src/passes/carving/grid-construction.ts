/**
 * Grid construction: rasterise rooms, then carve one corridor per edge.
 */

import {
  type Configuration,
  DEFAULT_CONFIGURATION,
} from "@delve/contracts";
import { inflateRect, toIndex } from "../../core/geometry/operations";
import type { Dimensions } from "../../core/geometry/types";
import { Grid } from "../../core/grid/grid";
import { Tile } from "../../core/grid/types";
import type { CarvingReport, Dungeon, Edge } from "../../pipeline/types";
import { AStarWorkspace, aStar, type CarvingCosts } from "./a-star";

export interface GridConstruction {
  readonly grid: Grid;
  readonly report: CarvingReport;
}

interface BatchResult {
  readonly carved: number;
  readonly failed: number;
}

/**
 * Base grid before carving: WALL everywhere, a BLOCKER ring on the map
 * border, ROOM interiors, and a BLOCKER ring around every room.
 */
export function rasterize(dimensions: Dimensions, dungeon: Dungeon): Grid {
  const grid = Grid.fromDimensions(dimensions, Tile.WALL);
  grid.strokeRect(
    { x: 0, y: 0, width: dimensions.width, height: dimensions.height },
    Tile.BLOCKER,
  );

  for (const room of dungeon.rooms) {
    grid.fillRect(room.bounds, Tile.ROOM);
    grid.strokeRect(inflateRect(room.bounds, 1), Tile.BLOCKER);
  }

  return grid;
}

/**
 * Turn a found path into tiles.
 *
 * Path cells become CORRIDOR unless they are doorways. Around each path
 * cell, WALL becomes CORRIDOR_NEIGHBOR, ROOM becomes DOORWAY, and an
 * existing CORRIDOR_NEIGHBOR is sealed as BLOCKER.
 */
export function materializePath(grid: Grid, path: readonly number[]): void {
  const width = grid.width;

  for (const cell of path) {
    if (grid.getIndex(cell) !== Tile.DOORWAY) {
      grid.setIndex(cell, Tile.CORRIDOR);
    }

    for (const neighbor of [cell + width, cell - width, cell + 1, cell - 1]) {
      switch (grid.getIndex(neighbor)) {
        case Tile.WALL:
          grid.setIndex(neighbor, Tile.CORRIDOR_NEIGHBOR);
          break;
        case Tile.ROOM:
          grid.setIndex(neighbor, Tile.DOORWAY);
          break;
        case Tile.CORRIDOR_NEIGHBOR:
          grid.setIndex(neighbor, Tile.BLOCKER);
          break;
      }
    }
  }
}

/**
 * Carve every corridor edge into `grid`.
 *
 * With `stopOnFailure` the batch ends at the first edge without a path.
 */
function carveBatch(
  grid: Grid,
  costs: CarvingCosts,
  dungeon: Dungeon,
  corridors: readonly Edge[],
  stopOnFailure: boolean,
): BatchResult {
  const workspace = new AStarWorkspace();
  let carved = 0;
  let failed = 0;

  for (const edge of corridors) {
    const from = dungeon.doorways[edge.from];
    const to = dungeon.doorways[edge.to];
    if (from === undefined || to === undefined) {
      throw new RangeError(
        `Corridor (${edge.from}, ${edge.to}) references a missing doorway`,
      );
    }

    const start = toIndex(from.position, grid.width);
    const goal = toIndex(to.position, grid.width);
    grid.setIndex(start, Tile.DOORWAY);
    grid.setIndex(goal, Tile.DOORWAY);

    const path = aStar(costs, start, goal, grid, workspace);
    if (path.length === 0) {
      failed++;
      if (stopOnFailure) break;
      continue;
    }

    materializePath(grid, path);
    carved++;
  }

  return { carved, failed };
}

/**
 * Rasterise and carve, reporting how carving went.
 *
 * Carving runs on a scratch copy of the raster. If any edge finds no path
 * under the configured costs, the copy is discarded and the whole batch is
 * carved again on a fresh copy with the default costs; that second result
 * is kept even when some edges still fail.
 */
export function buildGrid(
  config: Configuration,
  dimensions: Dimensions,
  dungeon: Dungeon,
  corridors: readonly Edge[],
): GridConstruction {
  const grid = rasterize(dimensions, dungeon);

  const scratch = grid.clone();
  const first = carveBatch(scratch, config, dungeon, corridors, true);
  if (first.failed === 0) {
    grid.copyFrom(scratch);
    return {
      grid,
      report: { carved: first.carved, failed: 0, usedFallbackCosts: false },
    };
  }

  // The raster is untouched, so the retry carves into it directly
  const second = carveBatch(
    grid,
    DEFAULT_CONFIGURATION,
    dungeon,
    corridors,
    false,
  );
  return {
    grid,
    report: {
      carved: second.carved,
      failed: second.failed,
      usedFallbackCosts: true,
    },
  };
}

/**
 * Tile grid for a dungeon and its corridor edges.
 */
export function makeGrid(
  config: Configuration,
  dimensions: Dimensions,
  dungeon: Dungeon,
  corridors: readonly Edge[],
): Grid {
  return buildGrid(config, dimensions, dungeon, corridors).grid;
}
