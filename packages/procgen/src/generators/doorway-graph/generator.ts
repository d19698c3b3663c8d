/**
 * Doorway Graph Generator
 *
 * Rooms by rejection sampling, Delaunay triangulation over their doorways,
 * spanning tree plus reintroduced edges, A* corridors, maze interiors.
 */

import { PipelineBuilder } from "../../pipeline/builder";
import type {
  DungeonArtifact,
  EmptyArtifact,
  Pipeline,
  PipelineSettings,
  TriangulationArtifact,
} from "../../pipeline/types";
import {
  carveMazes,
  constructGrid,
  finalizeDungeon,
  placeRooms,
  selectCorridors,
  triangulateDoorways,
} from "./passes";

/**
 * Full pipeline, from an empty artifact to a finished dungeon
 */
export function createDungeonPipeline(
  settings: PipelineSettings,
  targetRoomCount?: number,
): Pipeline<EmptyArtifact, DungeonArtifact> {
  return PipelineBuilder.create<EmptyArtifact>("doorway-graph", settings)
    .pipe(placeRooms(targetRoomCount))
    .pipe(triangulateDoorways())
    .pipe(selectCorridors())
    .pipe(constructGrid())
    .pipe(carveMazes())
    .pipe(finalizeDungeon())
    .build();
}

/**
 * Corridors and mazes only, reusing an existing layout and triangulation
 */
export function createCorridorPipeline(
  settings: PipelineSettings,
): Pipeline<TriangulationArtifact, DungeonArtifact> {
  return PipelineBuilder.create<TriangulationArtifact>(
    "doorway-graph.corridors",
    settings,
  )
    .pipe(selectCorridors())
    .pipe(constructGrid())
    .pipe(carveMazes())
    .pipe(finalizeDungeon())
    .build();
}
