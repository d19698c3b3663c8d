/**
 * Generator tunables.
 *
 * A configuration is immutable for the duration of a run. Validity is a pure
 * predicate: stages assume a valid configuration and do not re-check it.
 */
export interface Configuration {
  /** Minimum tile length of a room, for both width and height. */
  readonly minRoomDimension: number;
  /** Maximum tile length of a room. At least `minRoomDimension`. */
  readonly maxRoomDimension: number;
  /** Margin kept around every room and along the map border. */
  readonly minPadding: number;
  /** Inset of a doorway from the corners of its room side. */
  readonly doorwayOffset: number;
  /** Consecutive rejected placements after which room placement stops. */
  readonly maxFailCount: number;
  /** `[numerator, denominator]`: share of non-tree edges kept as corridors. */
  readonly reintroducedCorridorDensity: readonly [number, number];
  /** A* cost of entering a tile that already is a corridor. */
  readonly corridorCost: number;
  /** A* cost of continuing in the direction of the previous step. */
  readonly straightCost: number;
  /** A* cost of any other step. */
  readonly standardCost: number;
  /** Rooms smaller than this on either side never receive a maze. */
  readonly minMazeDimension: number;
  /** Probability in [0, 1] that a qualifying room receives a maze. */
  readonly mazeChance: number;
}

export const DEFAULT_CONFIGURATION: Configuration = Object.freeze({
  minRoomDimension: 5,
  maxRoomDimension: 20,
  minPadding: 3,
  doorwayOffset: 2,
  maxFailCount: 10,
  reintroducedCorridorDensity: Object.freeze([1, 2] as const),
  corridorCost: 1,
  straightCost: 2,
  standardCost: 3,
  minMazeDimension: 5,
  mazeChance: 0.1,
});

/** Smallest room side the generator supports. */
export const MIN_ROOM_DIMENSION = 5;
/** Smallest margin that keeps doorways reachable. */
export const MIN_PADDING = 3;

/**
 * Pure validity predicate over a configuration.
 */
export function isValidConfiguration(config: Configuration): boolean {
  const [numerator, denominator] = config.reintroducedCorridorDensity;
  const integers = [
    config.minRoomDimension,
    config.maxRoomDimension,
    config.minPadding,
    config.doorwayOffset,
    config.maxFailCount,
    numerator,
    denominator,
    config.corridorCost,
    config.straightCost,
    config.standardCost,
    config.minMazeDimension,
  ];

  return (
    integers.every(Number.isInteger) &&
    config.minRoomDimension >= MIN_ROOM_DIMENSION &&
    config.minRoomDimension <= config.maxRoomDimension &&
    config.minRoomDimension >= 2 * config.doorwayOffset + 1 &&
    config.minPadding >= MIN_PADDING &&
    config.doorwayOffset >= 1 &&
    config.maxFailCount >= 0 &&
    numerator >= 0 &&
    numerator <= denominator &&
    denominator >= 1 &&
    config.corridorCost >= 1 &&
    config.straightCost >= 1 &&
    config.standardCost >= 1 &&
    config.minMazeDimension >= MIN_ROOM_DIMENSION &&
    config.mazeChance >= 0 &&
    config.mazeChance <= 1
  );
}

/**
 * Smallest grid side able to hold one padded minimum-size room.
 */
export function minimumGridDimension(config: Configuration): number {
  return config.minRoomDimension + 2 * config.minPadding;
}
