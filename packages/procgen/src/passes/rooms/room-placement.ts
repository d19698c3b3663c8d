/**
 * Room placement by rejection sampling.
 */

import type { Configuration, RandomSource } from "@delve/contracts";
import { inflateRect, rectsOverlap } from "../../core/geometry/operations";
import type { Dimensions, Point, Rect } from "../../core/geometry/types";
import type { Doorway, Dungeon, Room } from "../../pipeline/types";

/** Doorway sides in mask bit order. */
export const DoorwaySide = {
  NORTH: 0,
  EAST: 1,
  SOUTH: 2,
  WEST: 3,
} as const;

export type DoorwaySide = (typeof DoorwaySide)[keyof typeof DoorwaySide];

const SIDES: readonly DoorwaySide[] = [
  DoorwaySide.NORTH,
  DoorwaySide.EAST,
  DoorwaySide.SOUTH,
  DoorwaySide.WEST,
];

/**
 * Whether two rooms collide once both are padded by `padding` on every side.
 */
export function roomsCollide(a: Rect, b: Rect, padding: number): boolean {
  return rectsOverlap(inflateRect(a, padding), inflateRect(b, padding));
}

/**
 * Position of a doorway `offset` cells along `side`, on the ring just
 * outside the room.
 */
export function doorwayPosition(
  bounds: Rect,
  side: DoorwaySide,
  offset: number,
): Point {
  switch (side) {
    case DoorwaySide.NORTH:
      return { x: bounds.x + offset, y: bounds.y - 1 };
    case DoorwaySide.EAST:
      return { x: bounds.x + bounds.width, y: bounds.y + offset };
    case DoorwaySide.SOUTH:
      return { x: bounds.x + offset, y: bounds.y + bounds.height };
    case DoorwaySide.WEST:
      return { x: bounds.x - 1, y: bounds.y + offset };
  }
}

/**
 * Draw the doorways of a freshly accepted room.
 *
 * One draw in [1, 15] picks the sides; each picked side then draws its
 * offset, so a room always has between one and four doorways.
 */
export function generateDoorways(
  config: Configuration,
  bounds: Rect,
  roomIndex: number,
  rng: RandomSource,
): Doorway[] {
  const mask = rng.range(1, 15);
  const doorways: Doorway[] = [];

  for (const side of SIDES) {
    if ((mask & (1 << side)) === 0) continue;

    const sideLength =
      side === DoorwaySide.NORTH || side === DoorwaySide.SOUTH
        ? bounds.width
        : bounds.height;
    const offset = rng.range(
      config.doorwayOffset,
      sideLength - config.doorwayOffset - 1,
    );

    doorways.push({
      position: doorwayPosition(bounds, side, offset),
      roomIndex,
    });
  }

  return doorways;
}

/**
 * Place up to `targetRoomCount` rooms (unbounded when undefined).
 *
 * Each attempt samples a rectangle that keeps `minPadding` to the map edge.
 * A rectangle whose padded bounds meet an accepted room's padded bounds is
 * a failure; `maxFailCount` consecutive failures end placement early,
 * which is not an error. A grid too small for one padded room yields an
 * empty dungeon.
 */
export function generateRooms(
  config: Configuration,
  dimensions: Dimensions,
  targetRoomCount: number | undefined,
  rng: RandomSource,
): Dungeon {
  const rooms: Room[] = [];
  const doorways: Doorway[] = [];

  const { minPadding, minRoomDimension, maxRoomDimension } = config;
  const maxX = dimensions.width - minPadding - minRoomDimension;
  const maxY = dimensions.height - minPadding - minRoomDimension;

  if (maxX < minPadding || maxY < minPadding) {
    return { rooms, doorways };
  }

  const target = targetRoomCount ?? Number.POSITIVE_INFINITY;
  let failCount = 0;

  while (rooms.length < target && failCount < config.maxFailCount) {
    const x = rng.range(minPadding, maxX);
    const y = rng.range(minPadding, maxY);
    const width = rng.range(
      minRoomDimension,
      Math.min(maxRoomDimension, dimensions.width - minPadding - x),
    );
    const height = rng.range(
      minRoomDimension,
      Math.min(maxRoomDimension, dimensions.height - minPadding - y),
    );
    const bounds: Rect = { x, y, width, height };

    if (rooms.some((room) => roomsCollide(room.bounds, bounds, minPadding))) {
      failCount++;
      continue;
    }

    failCount = 0;
    doorways.push(...generateDoorways(config, bounds, rooms.length, rng));
    rooms.push({ bounds });
  }

  return { rooms, doorways };
}
