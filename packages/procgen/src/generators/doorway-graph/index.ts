export { createCorridorPipeline, createDungeonPipeline } from "./generator";
export * as DoorwayGraphPasses from "./passes";
