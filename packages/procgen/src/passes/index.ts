/**
 * Pass Library
 *
 * The generation stages as plain functions, composed into pipeline passes
 * by the generator.
 *
 * @example
 * ```typescript
 * import { connectivity, rooms } from "@delve/procgen/passes";
 *
 * const dungeon = rooms.generateRooms(config, dimensions, 12, rng);
 * const edges = connectivity.triangulate(dimensions, dungeon);
 * const corridors = connectivity.pickCorridors(config, dungeon, edges, rng);
 * ```
 */

export * as carving from "./carving";
export * as connectivity from "./connectivity";
export * as maze from "./maze";
export * as rooms from "./rooms";
