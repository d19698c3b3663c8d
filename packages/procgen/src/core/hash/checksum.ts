/**
 * Dungeon Checksum Calculator
 *
 * Computes deterministic checksums for generated dungeons. Used to verify
 * that a seed reproduces the same layout across runs.
 *
 * Checksums carry a version prefix, format: "v{version}:{hash}". Increment
 * the version when changing what data is hashed or how.
 */

import type { Dungeon, Edge } from "../../pipeline/types";
import type { Grid } from "../grid/grid";
import { createFNV64Hasher } from "./fnv64";

export const CHECKSUM_VERSION = 1;

/**
 * Parse a versioned checksum into its components.
 * Returns null when the string is not a versioned checksum.
 */
export function parseChecksum(checksum: string): {
  version: number;
  hash: string;
} | null {
  const match = checksum.match(/^v(\d+):([0-9a-f]{16})$/);
  if (!match || !match[1] || !match[2]) return null;
  return {
    version: parseInt(match[1], 10),
    hash: match[2],
  };
}

/**
 * Calculate a deterministic checksum for a generated dungeon.
 *
 * Covers the tile grid, room rectangles, doorway positions with their
 * owners, and corridor endpoints.
 */
export function calculateChecksum(
  grid: Grid,
  dungeon: Dungeon,
  corridors: readonly Edge[],
): string {
  const hasher = createFNV64Hasher();

  hasher.updateInt32(CHECKSUM_VERSION);
  hasher.updateInt32(grid.width);
  hasher.updateInt32(grid.height);
  hasher.updateBytes(grid.getRawDataCopy());

  for (const room of dungeon.rooms) {
    hasher.updateInt32(room.bounds.x);
    hasher.updateInt32(room.bounds.y);
    hasher.updateInt32(room.bounds.width);
    hasher.updateInt32(room.bounds.height);
  }

  for (const doorway of dungeon.doorways) {
    hasher.updateInt32(doorway.position.x);
    hasher.updateInt32(doorway.position.y);
    hasher.updateInt32(doorway.roomIndex);
  }

  for (const edge of corridors) {
    hasher.updateInt32(edge.from);
    hasher.updateInt32(edge.to);
  }

  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
