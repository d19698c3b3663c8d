/**
 * Procedural dungeon generation.
 *
 * Rooms are scattered by rejection sampling, their doorways joined by a
 * Delaunay triangulation thinned to a spanning tree plus a share of the
 * remaining edges, and the chosen edges carved with A* into a tile grid.
 * Large rooms may receive a maze interior.
 *
 * @example
 * ```typescript
 * import { generate, formatGrid } from "@delve/procgen";
 *
 * const result = generate({ width: 120, height: 90, seed: 12345 });
 *
 * if (result.success) {
 *   console.log(`Generated dungeon with ${result.artifact.dungeon.rooms.length} rooms`);
 *   console.log(formatGrid(result.artifact.grid));
 * }
 * ```
 */

// Core modules
export * from "./core";
// Generators
export * from "./generators";
// Pass Library
export * as passes from "./passes";
// Pipeline
export * from "./pipeline";
// Utilities
export * from "./utils";
// High-level API
export {
  type ExistingLayout,
  generate,
  generateWithRandom,
  regenerateCorridors,
} from "./api";
export { randomSeed, seedFromString } from "./seed";
export * from "./testing";
export * from "./validation";

export {
  type Configuration,
  type ConfigurationInput,
  DEFAULT_CONFIGURATION,
  DungeonError,
  type GenerationRequest,
  isValidConfiguration,
  type RandomSource,
  resolveConfiguration,
  SeededRandom,
} from "@delve/contracts";
