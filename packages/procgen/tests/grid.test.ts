/**
 * Grid class unit tests
 */

import { describe, expect, it, vi } from "vitest";
import { Grid, Tile, toTile } from "../src/core/grid";

describe("Grid", () => {
  describe("construction", () => {
    it("creates grid with correct dimensions", () => {
      const grid = new Grid(100, 50);
      expect(grid.width).toBe(100);
      expect(grid.height).toBe(50);
      expect(grid.size).toBe(5000);
    });

    it("initializes with WALL by default", () => {
      const grid = new Grid(10, 10);
      expect(grid.get(0, 0)).toBe(Tile.WALL);
      expect(grid.countTiles(Tile.WALL)).toBe(100);
    });

    it("rejects empty dimensions", () => {
      expect(() => new Grid(0, 10)).toThrow("Invalid grid dimensions: 0x10");
    });

    it("builds from a tile list, leaving missing cells EMPTY", () => {
      const grid = Grid.fromTiles(2, 2, [Tile.ROOM, Tile.DOORWAY, Tile.WALL]);
      expect(grid.get(0, 0)).toBe(Tile.ROOM);
      expect(grid.get(1, 0)).toBe(Tile.DOORWAY);
      expect(grid.get(0, 1)).toBe(Tile.WALL);
      expect(grid.get(1, 1)).toBe(Tile.EMPTY);
    });
  });

  describe("cell access", () => {
    it("sets and gets by coordinates and by index", () => {
      const grid = new Grid(10, 10);
      grid.set(5, 4, Tile.CORRIDOR);
      expect(grid.get(5, 4)).toBe(Tile.CORRIDOR);
      expect(grid.getIndex(45)).toBe(Tile.CORRIDOR);

      grid.setIndex(12, Tile.ROOM);
      expect(grid.get(2, 1)).toBe(Tile.ROOM);
    });

    it("reads out-of-bounds cells as BLOCKER", () => {
      const grid = new Grid(10, 10);
      expect(grid.get(-1, 0)).toBe(Tile.BLOCKER);
      expect(grid.get(0, 10)).toBe(Tile.BLOCKER);
      expect(grid.getIndex(100)).toBe(Tile.BLOCKER);
      expect(grid.getIndex(-1)).toBe(Tile.BLOCKER);
    });

    it("ignores out-of-bounds writes with a warning", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const grid = new Grid(4, 4);
      grid.set(4, 0, Tile.ROOM);

      expect(grid.countTiles(Tile.ROOM)).toBe(0);
      expect(warn).toHaveBeenCalledWith(
        "Grid.set: out of bounds (4, 0) for grid 4x4",
      );
      warn.mockRestore();
    });
  });

  describe("bulk operations", () => {
    it("fills a rect clipped to the grid", () => {
      const grid = new Grid(5, 5);
      grid.fillRect({ x: 3, y: 3, width: 4, height: 4 }, Tile.ROOM);
      expect(grid.countTiles(Tile.ROOM)).toBe(4);
      expect(grid.get(4, 4)).toBe(Tile.ROOM);
      expect(grid.get(2, 2)).toBe(Tile.WALL);
    });

    it("strokes a rect outline", () => {
      const grid = new Grid(5, 5);
      grid.strokeRect({ x: 0, y: 0, width: 5, height: 5 }, Tile.BLOCKER);
      expect(grid.countTiles(Tile.BLOCKER)).toBe(16);
      expect(grid.get(2, 2)).toBe(Tile.WALL);
      expect(grid.get(4, 2)).toBe(Tile.BLOCKER);
    });
  });

  describe("copies", () => {
    it("clones independently", () => {
      const grid = new Grid(3, 3);
      const copy = grid.clone();
      copy.set(1, 1, Tile.ROOM);

      expect(grid.get(1, 1)).toBe(Tile.WALL);
      expect(grid.equals(copy)).toBe(false);
    });

    it("copies cells from a same-sized grid", () => {
      const grid = new Grid(3, 3);
      const other = new Grid(3, 3, Tile.ROOM);
      grid.copyFrom(other);
      expect(grid.equals(other)).toBe(true);

      expect(() => grid.copyFrom(new Grid(2, 3))).toThrow(
        "Grid.copyFrom: size mismatch 2x3 vs 3x3",
      );
    });
  });
});

describe("toTile", () => {
  it("maps stored bytes to tiles", () => {
    expect(toTile(0)).toBe(Tile.BLOCKER);
    expect(toTile(4)).toBe(Tile.CORRIDOR);
  });

  it("reads unknown values as EMPTY", () => {
    expect(toTile(42)).toBe(Tile.EMPTY);
    expect(toTile(undefined)).toBe(Tile.EMPTY);
  });
});
