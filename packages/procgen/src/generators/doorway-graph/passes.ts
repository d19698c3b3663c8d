/**
 * Doorway Graph Passes
 *
 * Individual passes for the room, triangulation, corridor and maze pipeline.
 */

import { calculateChecksum } from "../../core/hash";
import { buildGrid } from "../../passes/carving/grid-construction";
import { pickCorridors } from "../../passes/connectivity/corridor-selection";
import { triangulate } from "../../passes/connectivity/triangulation";
import { makeMazes } from "../../passes/maze/maze-carving";
import { generateRooms } from "../../passes/rooms/room-placement";
import type {
  CorridorsArtifact,
  DungeonArtifact,
  EmptyArtifact,
  GridArtifact,
  LayoutArtifact,
  Pass,
  TriangulationArtifact,
} from "../../pipeline/types";

// =============================================================================
// PLACE ROOMS PASS
// =============================================================================

/**
 * Places rooms and their doorways by rejection sampling
 */
export function placeRooms(
  targetRoomCount?: number,
): Pass<EmptyArtifact, LayoutArtifact> {
  return {
    id: "rooms.place",
    inputType: "empty",
    outputType: "layout",
    run(_input, ctx) {
      const dungeon = generateRooms(
        ctx.config,
        ctx.dimensions,
        targetRoomCount,
        ctx.rng,
      );

      ctx.trace.decision(
        "rooms.place",
        "Rooms placed",
        [targetRoomCount ?? "unbounded"],
        dungeon.rooms.length,
        `${dungeon.rooms.length} rooms with ${dungeon.doorways.length} doorways`,
      );

      if (
        targetRoomCount !== undefined &&
        dungeon.rooms.length < targetRoomCount
      ) {
        ctx.trace.warning(
          "rooms.place",
          `Placed ${dungeon.rooms.length} of ${targetRoomCount} rooms after ${ctx.config.maxFailCount} consecutive failures`,
        );
      }

      return { type: "layout", id: "layout", dungeon };
    },
  };
}

// =============================================================================
// TRIANGULATE PASS
// =============================================================================

/**
 * Builds the Delaunay graph over every doorway
 */
export function triangulateDoorways(): Pass<
  LayoutArtifact,
  TriangulationArtifact
> {
  return {
    id: "connectivity.triangulate",
    inputType: "layout",
    outputType: "triangulation",
    run(input, ctx) {
      const triangulation = triangulate(ctx.dimensions, input.dungeon);

      ctx.trace.decision(
        "connectivity.triangulate",
        "Delaunay edges",
        [],
        triangulation.length,
        `Triangulated ${input.dungeon.doorways.length} doorways`,
      );

      return {
        type: "triangulation",
        id: "triangulation",
        dungeon: input.dungeon,
        triangulation,
      };
    },
  };
}

// =============================================================================
// SELECT CORRIDORS PASS
// =============================================================================

/**
 * Keeps the spanning tree and reintroduces a share of the other edges
 */
export function selectCorridors(): Pass<
  TriangulationArtifact,
  CorridorsArtifact
> {
  return {
    id: "connectivity.corridors",
    inputType: "triangulation",
    outputType: "corridors",
    run(input, ctx) {
      const corridors = pickCorridors(
        ctx.config,
        input.dungeon,
        input.triangulation,
        ctx.rng,
      );
      const [numerator, denominator] = ctx.config.reintroducedCorridorDensity;

      ctx.trace.decision(
        "connectivity.corridors",
        "Corridor edges",
        [input.triangulation.length],
        corridors.length,
        `Spanning tree plus ${numerator}/${denominator} of the remaining cross-room edges`,
      );

      return {
        type: "corridors",
        id: "corridors",
        dungeon: input.dungeon,
        triangulation: input.triangulation,
        corridors,
      };
    },
  };
}

// =============================================================================
// CONSTRUCT GRID PASS
// =============================================================================

/**
 * Rasterises rooms and carves corridors with A*
 */
export function constructGrid(): Pass<CorridorsArtifact, GridArtifact> {
  return {
    id: "carving.grid",
    inputType: "corridors",
    outputType: "grid",
    run(input, ctx) {
      const { grid, report } = buildGrid(
        ctx.config,
        ctx.dimensions,
        input.dungeon,
        input.corridors,
      );

      if (report.usedFallbackCosts) {
        ctx.trace.decision(
          "carving.grid",
          "Carving costs",
          ["configured", "default"],
          "default",
          "A corridor had no path under the configured costs",
        );
      }
      if (report.failed > 0) {
        ctx.trace.warning(
          "carving.grid",
          `${report.failed} of ${input.corridors.length} corridors could not be carved`,
        );
      }

      return {
        type: "grid",
        id: "grid",
        dungeon: input.dungeon,
        triangulation: input.triangulation,
        corridors: input.corridors,
        grid,
        carving: report,
        mazeRooms: [],
      };
    },
  };
}

// =============================================================================
// CARVE MAZES PASS
// =============================================================================

/**
 * Overlays mazes on a random share of the large rooms
 */
export function carveMazes(): Pass<GridArtifact, GridArtifact> {
  return {
    id: "mazes.carve",
    inputType: "grid",
    outputType: "grid",
    run(input, ctx) {
      const mazeRooms = makeMazes(
        ctx.rng,
        ctx.config,
        input.grid,
        input.dungeon,
      );

      ctx.trace.decision(
        "mazes.carve",
        "Maze rooms",
        [],
        mazeRooms,
        `Chance ${ctx.config.mazeChance} per room of at least ${ctx.config.minMazeDimension} tiles`,
      );

      return { ...input, mazeRooms };
    },
  };
}

// =============================================================================
// FINALIZE PASS
// =============================================================================

/**
 * Converts the carved grid into the final dungeon artifact
 */
export function finalizeDungeon(): Pass<GridArtifact, DungeonArtifact> {
  return {
    id: "dungeon.finalize",
    inputType: "grid",
    outputType: "dungeon",
    run(input, ctx) {
      const checksum = calculateChecksum(
        input.grid,
        input.dungeon,
        input.corridors,
      );

      ctx.trace.decision(
        "dungeon.finalize",
        "Dungeon checksum",
        [],
        checksum,
        "Checksum computed from grid, rooms, doorways, and corridors",
      );

      return {
        type: "dungeon",
        id: "dungeon",
        width: ctx.dimensions.width,
        height: ctx.dimensions.height,
        dungeon: input.dungeon,
        triangulation: input.triangulation,
        corridors: input.corridors,
        grid: input.grid,
        carving: input.carving,
        mazeRooms: input.mazeRooms,
        checksum,
      };
    },
  };
}
