/**
 * Generators module - complete generation pipelines.
 */

export {
  createCorridorPipeline,
  createDungeonPipeline,
  DoorwayGraphPasses,
} from "./doorway-graph";
