import { DEFAULT_CONFIGURATION } from "@delve/contracts";
import { describe, expect, it } from "vitest";
import type { Point } from "../src/core/geometry";
import { AStarWorkspace, aStar } from "../src/passes/carving/a-star";
import { parseGrid } from "../src/utils/ascii-renderer";

const CHEAP_CORRIDORS = { corridorCost: 1, straightCost: 9, standardCost: 10 };

function cells(path: readonly number[], width: number): Point[] {
  return path.map((cell) => ({ x: cell % width, y: Math.floor(cell / width) }));
}

function search(
  text: string,
  start: Point,
  goal: Point,
  costs = DEFAULT_CONFIGURATION,
): Point[] {
  const grid = parseGrid(text);
  const w = grid.width;
  const path = aStar(costs, start.y * w + start.x, goal.y * w + goal.x, grid);
  return cells(path, w);
}

const OPEN = [
  "%%%%%%%%%%%",
  "%#########%",
  "%#########%",
  "%#########%",
  "%#########%",
  "%#########%",
  "%%%%%%%%%%%",
].join("\n");

describe("aStar", () => {
  it("walks straight across open wall", () => {
    const path = search(OPEN, { x: 1, y: 3 }, { x: 9, y: 3 });
    expect(path).toHaveLength(9);
    expect(path[0]).toEqual({ x: 9, y: 3 });
    expect(path[8]).toEqual({ x: 1, y: 3 });
    expect(path.every((p) => p.y === 3)).toBe(true);
  });

  it("detours around blockers", () => {
    const grid = [
      "%%%%%%%%%%%",
      "%#########%",
      "%####%####%",
      "%####%####%",
      "%####%####%",
      "%####%####%",
      "%%%%%%%%%%%",
    ].join("\n");

    const path = search(grid, { x: 1, y: 3 }, { x: 9, y: 3 });
    expect(path).toHaveLength(13);
    expect(path).toContainEqual({ x: 5, y: 1 });
  });

  it("returns an empty path when the goal is sealed off", () => {
    const grid = ["%%%%%", "%#%#%", "%d%d%", "%#%#%", "%%%%%"].join("\n");
    expect(search(grid, { x: 1, y: 2 }, { x: 3, y: 2 })).toEqual([]);
  });

  it("never steps onto ROOM tiles", () => {
    const grid = [
      "%%%%%%%",
      "%##_##%",
      "%##_##%",
      "%##_##%",
      "%%%%%%%",
    ].join("\n");
    expect(search(grid, { x: 1, y: 2 }, { x: 5, y: 2 })).toEqual([]);
  });

  describe("cost model", () => {
    const grid = [
      "%%%%%%%%%%%",
      "%#########%",
      "%#########%",
      "%#########%",
      "%##@@@@@##%",
      "%#@ccccc@#%",
      "%##@@@@@##%",
      "%%%%%%%%%%%",
    ].join("\n");

    it("prefers the straight route under default costs", () => {
      const path = search(grid, { x: 1, y: 3 }, { x: 9, y: 3 });
      expect(path).toHaveLength(9);
      expect(path.every((p) => p.y === 3)).toBe(true);
    });

    it("reuses an existing corridor when corridors are cheap", () => {
      const path = search(grid, { x: 1, y: 3 }, { x: 9, y: 3 }, {
        ...DEFAULT_CONFIGURATION,
        ...CHEAP_CORRIDORS,
      });
      expect(path).toHaveLength(13);
      for (let x = 3; x <= 7; x++) {
        expect(path).toContainEqual({ x, y: 5 });
      }
    });
  });

  describe("2x2 rule", () => {
    const grid = [
      "%%%%%%%",
      "%#####%",
      "%ccccc%",
      "%#####%",
      "%#####%",
      "%%%%%%%",
    ].join("\n");

    it("merges into a parallel corridor instead of hugging it", () => {
      expect(search(grid, { x: 1, y: 3 }, { x: 5, y: 3 })).toEqual([
        { x: 5, y: 3 },
        { x: 5, y: 2 },
        { x: 4, y: 2 },
        { x: 3, y: 2 },
        { x: 2, y: 2 },
        { x: 1, y: 2 },
        { x: 1, y: 3 },
      ]);
    });

    it("keeps one row away when the corridor is expensive", () => {
      const path = search(grid, { x: 1, y: 3 }, { x: 5, y: 3 }, {
        ...DEFAULT_CONFIGURATION,
        corridorCost: 9,
      });
      expect(path).toEqual([
        { x: 5, y: 3 },
        { x: 5, y: 4 },
        { x: 4, y: 4 },
        { x: 3, y: 4 },
        { x: 2, y: 4 },
        { x: 1, y: 4 },
        { x: 1, y: 3 },
      ]);
    });
  });

  it("reuses a workspace across searches", () => {
    const grid = parseGrid(OPEN);
    const workspace = new AStarWorkspace();
    const w = grid.width;

    const costs = DEFAULT_CONFIGURATION;
    const first = aStar(costs, 3 * w + 1, 3 * w + 9, grid, workspace);
    const second = aStar(costs, w + 1, 5 * w + 1, grid, workspace);

    expect(first).toHaveLength(9);
    expect(cells(second, w)).toEqual([
      { x: 1, y: 5 },
      { x: 1, y: 4 },
      { x: 1, y: 3 },
      { x: 1, y: 2 },
      { x: 1, y: 1 },
    ]);
  });
});
