/**
 * A* search used to carve corridors.
 *
 * Works on flat tile indices and reads 4-neighbours without bounds
 * checks: the grid's outer ring is BLOCKER, so the search never reaches a
 * cell whose neighbours fall outside the grid.
 */

import type { Configuration } from "@delve/contracts";
import { MinHeap } from "../../core/data-structures/min-heap";
import type { Grid } from "../../core/grid/grid";
import { Tile } from "../../core/grid/types";

export type CarvingCosts = Pick<
  Configuration,
  "corridorCost" | "straightCost" | "standardCost"
>;

const UNSET = -1;

/**
 * Scratch buffers reused by every search of a carving batch.
 */
export class AStarWorkspace {
  readonly openSet = new MinHeap<number>();
  gScores = new Float64Array(0);
  parent = new Int32Array(0);
  /** Steps from the start, set once a cell is expanded. */
  depth = new Int32Array(0);
  /** Skip pointer towards the start for level-ancestor queries. */
  jump = new Int32Array(0);

  reset(size: number): void {
    if (this.gScores.length !== size) {
      this.gScores = new Float64Array(size);
      this.parent = new Int32Array(size);
      this.depth = new Int32Array(size);
      this.jump = new Int32Array(size);
    }
    this.openSet.clear();
    this.gScores.fill(Number.POSITIVE_INFINITY);
    this.depth.fill(UNSET);
    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
      this.jump[i] = i;
    }
  }
}

function manhattan(width: number, a: number, b: number): number {
  return (
    Math.abs(Math.floor(a / width) - Math.floor(b / width)) +
    Math.abs((a % width) - (b % width))
  );
}

/**
 * Attach an expanded cell under its final parent.
 *
 * Jump pointers follow the skew-binary layout, so any ancestor at a given
 * depth is reached in a logarithmic number of hops.
 */
function settle(ws: AStarWorkspace, cell: number): void {
  const up = ws.parent[cell] ?? cell;
  if (up === cell) {
    ws.depth[cell] = 0;
    ws.jump[cell] = cell;
    return;
  }

  const upDepth = ws.depth[up] ?? 0;
  const upJump = ws.jump[up] ?? up;
  const upJumpJump = ws.jump[upJump] ?? upJump;
  ws.depth[cell] = upDepth + 1;
  ws.jump[cell] =
    upDepth - (ws.depth[upJump] ?? 0) ===
    (ws.depth[upJump] ?? 0) - (ws.depth[upJumpJump] ?? 0)
      ? upJumpJump
      : up;
}

/**
 * Whether `cell` lies on the settled chain from `current` back to the start.
 */
function isOnChain(ws: AStarWorkspace, current: number, cell: number): boolean {
  const target = ws.depth[cell] ?? UNSET;
  if (target === UNSET || target > (ws.depth[current] ?? UNSET)) return false;

  let node = current;
  while ((ws.depth[node] ?? 0) > target) {
    const skip = ws.jump[node] ?? node;
    node = (ws.depth[skip] ?? 0) >= target ? skip : (ws.parent[node] ?? node);
  }
  return node === cell;
}

/**
 * Whether stepping from `current` onto `next` would close a 2x2 block.
 *
 * A cell of the block counts as taken when it already is a corridor or
 * belongs to the path being built. This is wider than testing only the
 * current, parent and grandparent cells: it also refuses to run alongside
 * corridors carved earlier and to fold back onto older parts of the path,
 * so no grid ever holds a 2x2 corridor block.
 */
function closesSquare(
  grid: Grid,
  ws: AStarWorkspace,
  current: number,
  next: number,
): boolean {
  const width = grid.width;
  const taken = (cell: number): boolean =>
    cell === current ||
    grid.getIndex(cell) === Tile.CORRIDOR ||
    isOnChain(ws, current, cell);

  for (const dx of [-1, 1]) {
    for (const dy of [-width, width]) {
      if (taken(next + dx) && taken(next + dy) && taken(next + dx + dy)) {
        return true;
      }
    }
  }
  return false;
}

/**
 * Cheapest corridor from `start` to `goal` under the carving rules.
 *
 * Entering a corridor tile costs `corridorCost`, continuing in the
 * direction of the previous step `straightCost`, any other step
 * `standardCost`. BLOCKER and ROOM tiles are impassable, one
 * CORRIDOR_NEIGHBOR may not step onto another, and no step may complete a
 * 2x2 block.
 *
 * @returns Flat indices from `goal` back to `start`, empty when the goal
 * cannot be reached
 */
export function aStar(
  costs: CarvingCosts,
  start: number,
  goal: number,
  grid: Grid,
  ws: AStarWorkspace = new AStarWorkspace(),
): number[] {
  const { corridorCost, straightCost, standardCost } = costs;
  const minCost = Math.min(corridorCost, straightCost, standardCost);
  const width = grid.width;
  const heuristic = (cell: number): number =>
    manhattan(width, cell, goal) * minCost;

  ws.reset(grid.size);
  ws.gScores[start] = 0;
  ws.openSet.insert(heuristic(start), start);

  for (
    let entry = ws.openSet.extractMin();
    entry !== undefined;
    entry = ws.openSet.extractMin()
  ) {
    const current = entry.value;
    const gCost = entry.key - heuristic(current);
    const known = ws.gScores[current] ?? Number.POSITIVE_INFINITY;
    // Stale entry, a cheaper route was queued later
    if (gCost > known) continue;

    settle(ws, current);

    if (current === goal) {
      const path = [current];
      let cell = current;
      while ((ws.parent[cell] ?? cell) !== cell) {
        cell = ws.parent[cell] ?? cell;
        path.push(cell);
      }
      return path;
    }

    const currentTile = grid.getIndex(current);
    const previousStep = Math.abs(current - (ws.parent[current] ?? current));

    for (const neighbor of [
      current + width, // south
      current - width, // north
      current + 1, // east
      current - 1, // west
    ]) {
      const tile = grid.getIndex(neighbor);
      if (tile === Tile.BLOCKER || tile === Tile.ROOM) continue;
      if (
        currentTile === Tile.CORRIDOR_NEIGHBOR &&
        tile === Tile.CORRIDOR_NEIGHBOR
      ) {
        continue;
      }
      if (closesSquare(grid, ws, current, neighbor)) continue;

      const cost =
        tile === Tile.CORRIDOR
          ? corridorCost
          : previousStep === Math.abs(neighbor - current)
            ? straightCost
            : standardCost;

      const tentative = known + cost;
      if (tentative < (ws.gScores[neighbor] ?? Number.POSITIVE_INFINITY)) {
        ws.parent[neighbor] = current;
        ws.gScores[neighbor] = tentative;
        ws.openSet.insert(tentative + heuristic(neighbor), neighbor);
      }
    }
  }

  return [];
}
