/**
 * Pipeline Artifacts
 *
 * Typed intermediate and final data products for the generation pipeline.
 */

import type { Point, Rect } from "../../core/geometry/types";
import type { Grid } from "../../core/grid/grid";

// =============================================================================
// DUNGEON MODEL
// =============================================================================

/**
 * Axis-aligned room. Immutable once placed.
 */
export interface Room {
  readonly bounds: Rect;
}

/**
 * Corridor attachment point on the one-cell ring just outside a room.
 */
export interface Doorway {
  readonly position: Point;
  /** Index of the owning room in `Dungeon.rooms`. */
  readonly roomIndex: number;
}

/**
 * Placed rooms plus every doorway, in discovery order.
 */
export interface Dungeon {
  readonly rooms: readonly Room[];
  readonly doorways: readonly Doorway[];
}

/**
 * Unordered pair of doorway indices, normalised so `from < to`.
 */
export interface Edge {
  readonly from: number;
  readonly to: number;
}

/**
 * Outcome of grid construction.
 */
export interface CarvingReport {
  /** Corridor edges for which a path was carved. */
  readonly carved: number;
  /** Corridor edges left unconnected. */
  readonly failed: number;
  /** True when the configured costs failed and default costs were used. */
  readonly usedFallbackCosts: boolean;
}

// =============================================================================
// BASE ARTIFACT
// =============================================================================

/**
 * Base artifact interface. All artifacts have a type discriminant and unique ID.
 */
export interface Artifact<T extends string = string> {
  readonly type: T;
  readonly id: string;
}

// =============================================================================
// ARTIFACT TYPES
// =============================================================================

/**
 * Empty artifact - starting point for pipelines
 */
export interface EmptyArtifact extends Artifact<"empty"> {
  readonly type: "empty";
}

/**
 * Rooms and doorways, before any connectivity is known
 */
export interface LayoutArtifact extends Artifact<"layout"> {
  readonly type: "layout";
  readonly dungeon: Dungeon;
}

/**
 * Layout plus the Delaunay edges over its doorways
 */
export interface TriangulationArtifact extends Artifact<"triangulation"> {
  readonly type: "triangulation";
  readonly dungeon: Dungeon;
  readonly triangulation: readonly Edge[];
}

/**
 * Triangulation plus the edges picked as corridors
 */
export interface CorridorsArtifact extends Artifact<"corridors"> {
  readonly type: "corridors";
  readonly dungeon: Dungeon;
  readonly triangulation: readonly Edge[];
  readonly corridors: readonly Edge[];
}

/**
 * Carved tile grid, still open to overlays
 *
 * @remarks
 * The `readonly grid` field prevents reassigning the reference, while
 * overlay passes such as maze carving still edit its tiles in place.
 */
export interface GridArtifact extends Artifact<"grid"> {
  readonly type: "grid";
  readonly dungeon: Dungeon;
  readonly triangulation: readonly Edge[];
  readonly corridors: readonly Edge[];
  readonly grid: Grid;
  readonly carving: CarvingReport;
  /** Indices of rooms that received a maze. */
  readonly mazeRooms: readonly number[];
}

/**
 * Final dungeon artifact
 */
export interface DungeonArtifact extends Artifact<"dungeon"> {
  readonly type: "dungeon";
  readonly width: number;
  readonly height: number;
  readonly dungeon: Dungeon;
  readonly triangulation: readonly Edge[];
  readonly corridors: readonly Edge[];
  readonly grid: Grid;
  readonly carving: CarvingReport;
  readonly mazeRooms: readonly number[];
  readonly checksum: string;
}

/**
 * Union of all artifact types
 */
export type AnyArtifact =
  | EmptyArtifact
  | LayoutArtifact
  | TriangulationArtifact
  | CorridorsArtifact
  | GridArtifact
  | DungeonArtifact;
