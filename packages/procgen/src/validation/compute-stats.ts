import { Tile } from "../core/grid";
import type { DungeonArtifact } from "../pipeline/types";

export type TileName = keyof typeof Tile;

const TILE_NAMES: readonly TileName[] = [
  "BLOCKER",
  "WALL",
  "ROOM",
  "DOORWAY",
  "CORRIDOR",
  "CORRIDOR_NEIGHBOR",
  "EMPTY",
];

/**
 * Generation statistics for analyzing dungeons
 */
export interface GenerationStats {
  readonly roomCount: number;
  readonly doorwayCount: number;
  readonly triangulationEdgeCount: number;
  readonly corridorCount: number;
  readonly carvedCorridorCount: number;
  readonly failedCorridorCount: number;
  readonly mazeCount: number;
  readonly avgRoomSize: number;
  readonly minRoomSize: number;
  readonly maxRoomSize: number;
  readonly tileCounts: Readonly<Record<TileName, number>>;
  /** Share of the grid covered by corridor tiles */
  readonly corridorRatio: number;
}

/**
 * Compute statistics for a generated dungeon
 */
export function computeStats(artifact: DungeonArtifact): GenerationStats {
  const { rooms, doorways } = artifact.dungeon;
  const grid = artifact.grid;

  const tileCounts: Record<TileName, number> = {
    BLOCKER: 0,
    WALL: 0,
    ROOM: 0,
    DOORWAY: 0,
    CORRIDOR: 0,
    CORRIDOR_NEIGHBOR: 0,
    EMPTY: 0,
  };
  for (const name of TILE_NAMES) {
    tileCounts[name] = grid.countTiles(Tile[name]);
  }

  let totalRoomArea = 0;
  let minRoomSize = Number.POSITIVE_INFINITY;
  let maxRoomSize = 0;
  for (const room of rooms) {
    const size = room.bounds.width * room.bounds.height;
    totalRoomArea += size;
    if (size < minRoomSize) minRoomSize = size;
    if (size > maxRoomSize) maxRoomSize = size;
  }
  if (rooms.length === 0) {
    minRoomSize = 0;
  }

  return {
    roomCount: rooms.length,
    doorwayCount: doorways.length,
    triangulationEdgeCount: artifact.triangulation.length,
    corridorCount: artifact.corridors.length,
    carvedCorridorCount: artifact.carving.carved,
    failedCorridorCount: artifact.carving.failed,
    mazeCount: artifact.mazeRooms.length,
    avgRoomSize: rooms.length > 0 ? totalRoomArea / rooms.length : 0,
    minRoomSize,
    maxRoomSize,
    tileCounts,
    corridorRatio: grid.size > 0 ? tileCounts.CORRIDOR / grid.size : 0,
  };
}
