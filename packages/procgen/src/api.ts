/**
 * Generation API
 *
 * High-level API for dungeon generation.
 */

import {
  buildGenerationRequest,
  DungeonError,
  type GenerationRequest,
  type RandomSource,
  SeededRandom,
} from "@delve/contracts";
import {
  createCorridorPipeline,
  createDungeonPipeline,
} from "./generators/doorway-graph";
import type {
  Dungeon,
  DungeonArtifact,
  Edge,
  PipelineFailure,
  PipelineOptions,
  PipelineResult,
  PipelineSettings,
} from "./pipeline/types";

/**
 * Layout a corridor regeneration starts from
 */
export interface ExistingLayout {
  readonly dungeon: Dungeon;
  readonly triangulation: readonly Edge[];
}

/**
 * Failure for input rejected before any pass runs.
 * Compatible with PipelineFailure.
 */
function rejected(error: DungeonError): PipelineFailure {
  return {
    success: false,
    error,
    trace: [],
    snapshots: [],
    durationMs: 0,
  };
}

/**
 * Check a caller-supplied layout against the grid it is rebuilt on.
 *
 * Carving relies on the outer ring of the map staying BLOCKER, so every
 * room ring and every doorway must lie strictly inside it.
 */
function checkLayout(
  layout: ExistingLayout,
  request: GenerationRequest,
): DungeonError | undefined {
  const { width, height } = request;
  const { rooms, doorways } = layout.dungeon;

  for (const [index, { bounds }] of rooms.entries()) {
    if (
      bounds.x < 1 ||
      bounds.y < 1 ||
      bounds.x + bounds.width > width - 1 ||
      bounds.y + bounds.height > height - 1
    ) {
      return DungeonError.layoutInvalid(
        `Room ${index} does not fit inside a ${width}x${height} grid`,
        { room: index, bounds },
      );
    }
  }

  for (const [index, { position, roomIndex }] of doorways.entries()) {
    if (
      position.x < 1 ||
      position.y < 1 ||
      position.x > width - 2 ||
      position.y > height - 2
    ) {
      return DungeonError.layoutInvalid(
        `Doorway ${index} at (${position.x}, ${position.y}) lies on or outside the map border`,
        { doorway: index, position },
      );
    }
    if (rooms[roomIndex] === undefined) {
      return DungeonError.layoutInvalid(
        `Doorway ${index} references missing room ${roomIndex}`,
        { doorway: index, roomIndex },
      );
    }
  }

  for (const edge of layout.triangulation) {
    if (edge.from >= edge.to || edge.to >= doorways.length || edge.from < 0) {
      return DungeonError.layoutInvalid(
        `Edge (${edge.from}, ${edge.to}) is not a valid doorway pair`,
        { edge },
      );
    }
  }

  return undefined;
}

function settingsFor(request: GenerationRequest): PipelineSettings {
  return {
    config: request.configuration,
    dimensions: { width: request.width, height: request.height },
    trace: request.trace,
  };
}

/**
 * Run the full pipeline for an already validated request.
 *
 * Takes any random source, so tests can replay a scripted sequence.
 */
export function generateWithRandom(
  request: GenerationRequest,
  rng: RandomSource,
  options?: PipelineOptions,
): PipelineResult<DungeonArtifact> {
  const pipeline = createDungeonPipeline(
    settingsFor(request),
    request.targetRoomCount,
  );
  return pipeline.runSync({ type: "empty", id: "empty" }, rng, options);
}

/**
 * Generate a dungeon.
 *
 * The input is validated first: malformed fields or an invalid
 * configuration fail with `CONFIG_INVALID`, a grid too small for one
 * padded room with `CONFIG_DIMENSION_TOO_SMALL`.
 *
 * @example
 * ```typescript
 * const result = generate({ width: 80, height: 60, seed: 12345 });
 * if (result.success) {
 *   console.log(result.artifact.checksum);
 * }
 * ```
 */
export function generate(
  input: unknown,
  options?: PipelineOptions,
): PipelineResult<DungeonArtifact> {
  const request = buildGenerationRequest(input);
  if (!request.success) {
    return rejected(request.error);
  }

  return generateWithRandom(
    request.value,
    new SeededRandom(request.value.seed),
    options,
  );
}

/**
 * Pick new corridors for an existing layout, then rebuild its grid and
 * mazes. Rooms, doorways and triangulation are kept as they are.
 *
 * A layout whose rooms or doorways reach the map border, or whose edges
 * name missing doorways, fails with `LAYOUT_INVALID`.
 */
export function regenerateCorridors(
  input: unknown,
  layout: ExistingLayout,
  options?: PipelineOptions,
): PipelineResult<DungeonArtifact> {
  const request = buildGenerationRequest(input);
  if (!request.success) {
    return rejected(request.error);
  }

  const invalid = checkLayout(layout, request.value);
  if (invalid) {
    return rejected(invalid);
  }

  const pipeline = createCorridorPipeline(settingsFor(request.value));
  return pipeline.runSync(
    {
      type: "triangulation",
      id: "triangulation",
      dungeon: layout.dungeon,
      triangulation: layout.triangulation,
    },
    new SeededRandom(request.value.seed),
    options,
  );
}
