import { DEFAULT_CONFIGURATION } from "@delve/contracts";
import { describe, expect, it } from "vitest";
import { generate } from "../src/api";
import { Tile } from "../src/core/grid";
import { calculateChecksum } from "../src/core/hash";
import type { DungeonArtifact } from "../src/pipeline/types";
import { computeStats, validateDungeon } from "../src/validation";

function generated(seed: number): DungeonArtifact {
  const result = generate({ width: 80, height: 60, seed });
  if (!result.success) throw result.error;
  return result.artifact;
}

/** Copy with a fresh checksum, so only the tampered invariant fails */
function resealed(artifact: DungeonArtifact): DungeonArtifact {
  return {
    ...artifact,
    checksum: calculateChecksum(
      artifact.grid,
      artifact.dungeon,
      artifact.corridors,
    ),
  };
}

function errorTypes(artifact: DungeonArtifact): string[] {
  return validateDungeon(artifact)
    .violations.filter((v) => v.severity === "error")
    .map((v) => v.type);
}

describe("validateDungeon", () => {
  it("accepts a generated dungeon", () => {
    const result = validateDungeon(generated(4));
    expect(result.success).toBe(true);
  });

  it("detects a stale checksum", () => {
    const artifact = generated(4);
    expect(errorTypes({ ...artifact, checksum: "v1:0000000000000000" })).toEqual(
      ["invariant.checksum"],
    );
  });

  it("detects a 2x2 corridor block", () => {
    const artifact = generated(4);
    const grid = artifact.grid.clone();
    // The map border is never touched, so the block sits just inside it
    grid.set(1, 1, Tile.CORRIDOR);
    grid.set(2, 1, Tile.CORRIDOR);
    grid.set(1, 2, Tile.CORRIDOR);
    grid.set(2, 2, Tile.CORRIDOR);

    const types = errorTypes(resealed({ ...artifact, grid }));
    expect(types).toContain("invariant.corridor.square");
  });

  it("detects a breached map border", () => {
    const artifact = generated(4);
    const grid = artifact.grid.clone();
    grid.set(0, 5, Tile.WALL);

    expect(errorTypes(resealed({ ...artifact, grid }))).toEqual([
      "invariant.ring",
    ]);
  });

  it("detects overlapping rooms", () => {
    const base = generated(4);
    const first = base.dungeon.rooms[0];
    if (!first) throw new Error("expected a room");

    const artifact = resealed({
      ...base,
      dungeon: {
        rooms: [first, { bounds: { ...first.bounds, x: first.bounds.x + 2 } }],
        doorways: [],
      },
      corridors: [],
      triangulation: [],
    });
    expect(errorTypes(artifact)).toContain("invariant.room.overlap");
  });

  it("detects a doorway off its room's ring", () => {
    const base = generated(4);
    const first = base.dungeon.rooms[0];
    if (!first) throw new Error("expected a room");

    const artifact = resealed({
      ...base,
      dungeon: {
        rooms: base.dungeon.rooms,
        doorways: [
          {
            // The ring corner is never a valid doorway
            position: { x: first.bounds.x - 1, y: first.bounds.y - 1 },
            roomIndex: 0,
          },
        ],
      },
      corridors: [],
      triangulation: [],
    });
    expect(errorTypes(artifact)).toEqual(["invariant.doorway.position"]);
  });

  it("detects same-room and unknown corridors", () => {
    const base = generated(4);
    const artifact = resealed({
      ...base,
      dungeon: {
        rooms: base.dungeon.rooms,
        doorways: [
          { position: { x: 0, y: 0 }, roomIndex: 99 },
          { position: { x: 0, y: 0 }, roomIndex: 99 },
        ],
      },
      corridors: [{ from: 0, to: 1 }],
      triangulation: [],
    });

    expect(errorTypes(artifact)).toEqual([
      "invariant.doorway.room",
      "invariant.doorway.room",
      "invariant.corridor.same-room",
      "invariant.corridor.triangulation",
    ]);
  });

  it("warns about corridors that could not be carved", () => {
    const base = generated(4);
    const result = validateDungeon({
      ...base,
      carving: { ...base.carving, failed: 2 },
    });

    expect(result.success).toBe(true);
    expect(result.violations).toEqual([
      {
        type: "carving.incomplete",
        message: "2 corridor(s) could not be carved",
        severity: "warning",
      },
    ]);
  });

  it("checks doorway offsets against the given configuration", () => {
    const result = generate({
      width: 80,
      height: 60,
      seed: 4,
      configuration: { doorwayOffset: 1 },
    });
    if (!result.success) throw result.error;

    expect(
      validateDungeon(result.artifact, {
        ...DEFAULT_CONFIGURATION,
        doorwayOffset: 1,
      }).success,
    ).toBe(true);
  });
});

describe("computeStats", () => {
  it("summarises a generated dungeon", () => {
    const artifact = generated(6);
    const stats = computeStats(artifact);

    expect(stats.roomCount).toBe(artifact.dungeon.rooms.length);
    expect(stats.doorwayCount).toBe(artifact.dungeon.doorways.length);
    expect(stats.corridorCount).toBe(artifact.corridors.length);
    expect(stats.triangulationEdgeCount).toBe(artifact.triangulation.length);
    expect(stats.mazeCount).toBe(artifact.mazeRooms.length);

    const total = Object.values(stats.tileCounts).reduce((a, b) => a + b, 0);
    expect(total).toBe(80 * 60);
    expect(stats.tileCounts.CORRIDOR).toBe(
      artifact.grid.countTiles(Tile.CORRIDOR),
    );
    expect(stats.corridorRatio).toBe(stats.tileCounts.CORRIDOR / 4800);
    expect(stats.minRoomSize).toBeLessThanOrEqual(stats.avgRoomSize);
    expect(stats.avgRoomSize).toBeLessThanOrEqual(stats.maxRoomSize);
  });
});
