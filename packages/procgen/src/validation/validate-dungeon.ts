import { type Configuration, DEFAULT_CONFIGURATION } from "@delve/contracts";
import { inflateRect } from "../core/geometry/operations";
import type { Rect } from "../core/geometry/types";
import { type ReadonlyGrid, Tile } from "../core/grid";
import { calculateChecksum } from "../core/hash";
import { roomsCollide } from "../passes/rooms/room-placement";
import type { Doorway, DungeonArtifact } from "../pipeline/types";
import {
  type DungeonValidationResult,
  hasErrorViolations,
  type Violation,
} from "./result-types";

/**
 * Whether a doorway sits on the ring just outside `bounds`, at least
 * `offset` cells away from either corner of its side.
 */
function isOnDoorwayRing(
  doorway: Doorway,
  bounds: Rect,
  offset: number,
): boolean {
  const { x, y } = doorway.position;
  const alongX =
    x >= bounds.x + offset && x <= bounds.x + bounds.width - offset - 1;
  const alongY =
    y >= bounds.y + offset && y <= bounds.y + bounds.height - offset - 1;

  if (y === bounds.y - 1 || y === bounds.y + bounds.height) return alongX;
  if (x === bounds.x - 1 || x === bounds.x + bounds.width) return alongY;
  return false;
}

function checkRooms(
  artifact: DungeonArtifact,
  config: Configuration,
  violations: Violation[],
): void {
  const { rooms } = artifact.dungeon;
  for (let i = 0; i < rooms.length; i++) {
    for (let j = i + 1; j < rooms.length; j++) {
      const a = rooms[i];
      const b = rooms[j];
      if (a && b && roomsCollide(a.bounds, b.bounds, config.minPadding)) {
        violations.push({
          type: "invariant.room.overlap",
          message: `Rooms ${i} and ${j} overlap once padded by ${config.minPadding}`,
          severity: "error",
        });
      }
    }
  }
}

function checkDoorways(
  artifact: DungeonArtifact,
  config: Configuration,
  violations: Violation[],
): void {
  const { rooms, doorways } = artifact.dungeon;
  doorways.forEach((doorway, index) => {
    const room = rooms[doorway.roomIndex];
    if (room === undefined) {
      violations.push({
        type: "invariant.doorway.room",
        message: `Doorway ${index} references missing room ${doorway.roomIndex}`,
        severity: "error",
      });
      return;
    }

    if (!isOnDoorwayRing(doorway, room.bounds, config.doorwayOffset)) {
      violations.push({
        type: "invariant.doorway.position",
        message: `Doorway ${index} at (${doorway.position.x}, ${doorway.position.y}) is not on the ring of room ${doorway.roomIndex}`,
        severity: "error",
      });
    }
  });
}

function checkCorridors(
  artifact: DungeonArtifact,
  violations: Violation[],
): void {
  const { doorways } = artifact.dungeon;
  const triangulation = new Set(
    artifact.triangulation.map((edge) => `${edge.from},${edge.to}`),
  );

  for (const edge of artifact.corridors) {
    const from = doorways[edge.from];
    const to = doorways[edge.to];
    if (from === undefined || to === undefined || edge.from >= edge.to) {
      violations.push({
        type: "invariant.corridor.edge",
        message: `Corridor (${edge.from}, ${edge.to}) is not a valid doorway pair`,
        severity: "error",
      });
      continue;
    }

    if (from.roomIndex === to.roomIndex) {
      violations.push({
        type: "invariant.corridor.same-room",
        message: `Corridor (${edge.from}, ${edge.to}) joins two doorways of room ${from.roomIndex}`,
        severity: "error",
      });
    }

    if (!triangulation.has(`${edge.from},${edge.to}`)) {
      violations.push({
        type: "invariant.corridor.triangulation",
        message: `Corridor (${edge.from}, ${edge.to}) is not a triangulation edge`,
        severity: "error",
      });
    }
  }

  if (artifact.carving.failed > 0) {
    violations.push({
      type: "carving.incomplete",
      message: `${artifact.carving.failed} corridor(s) could not be carved`,
      severity: "warning",
    });
  }
}

function checkRing(
  grid: ReadonlyGrid,
  ring: Rect,
  allowDoorways: boolean,
  label: string,
  violations: Violation[],
): void {
  const right = ring.x + ring.width - 1;
  const bottom = ring.y + ring.height - 1;

  const check = (x: number, y: number): void => {
    const tile = grid.get(x, y);
    if (tile === Tile.BLOCKER) return;
    if (allowDoorways && tile === Tile.DOORWAY) return;
    violations.push({
      type: "invariant.ring",
      message: `${label} cell (${x}, ${y}) holds tile ${tile}`,
      severity: "error",
    });
  };

  for (let x = ring.x; x <= right; x++) {
    check(x, ring.y);
    if (bottom !== ring.y) check(x, bottom);
  }
  for (let y = ring.y + 1; y < bottom; y++) {
    check(ring.x, y);
    if (right !== ring.x) check(right, y);
  }
}

function checkCorridorSquares(
  grid: ReadonlyGrid,
  violations: Violation[],
): void {
  for (let y = 0; y + 1 < grid.height; y++) {
    for (let x = 0; x + 1 < grid.width; x++) {
      if (
        grid.get(x, y) === Tile.CORRIDOR &&
        grid.get(x + 1, y) === Tile.CORRIDOR &&
        grid.get(x, y + 1) === Tile.CORRIDOR &&
        grid.get(x + 1, y + 1) === Tile.CORRIDOR
      ) {
        violations.push({
          type: "invariant.corridor.square",
          message: `2x2 block of corridor tiles at (${x}, ${y})`,
          severity: "error",
        });
      }
    }
  }
}

/**
 * Validate a generated dungeon for invariant assertions.
 *
 * Checks:
 * - Padded rooms do not overlap
 * - Doorways sit on their room's ring, clear of the corners
 * - Corridors join doorways of different rooms along triangulation edges
 * - The map border is BLOCKER; room rings are BLOCKER or DOORWAY
 * - No 2x2 block of corridor tiles
 * - Checksum matches recomputed value
 *
 * `config` must be the configuration the dungeon was generated with.
 */
export function validateDungeon(
  artifact: DungeonArtifact,
  config: Configuration = DEFAULT_CONFIGURATION,
): DungeonValidationResult {
  const violations: Violation[] = [];
  const { grid } = artifact;

  checkRooms(artifact, config, violations);
  checkDoorways(artifact, config, violations);
  checkCorridors(artifact, violations);

  checkRing(
    grid,
    { x: 0, y: 0, width: grid.width, height: grid.height },
    false,
    "Border",
    violations,
  );
  artifact.dungeon.rooms.forEach((room, index) => {
    checkRing(
      grid,
      inflateRect(room.bounds, 1),
      true,
      `Room ${index} ring`,
      violations,
    );
  });

  checkCorridorSquares(grid, violations);

  const recomputed = calculateChecksum(
    grid,
    artifact.dungeon,
    artifact.corridors,
  );
  if (recomputed !== artifact.checksum) {
    violations.push({
      type: "invariant.checksum",
      message: `Checksum mismatch: stored ${artifact.checksum}, computed ${recomputed}`,
      severity: "error",
    });
  }

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}
