/**
 * Pipeline Types
 *
 * Type-safe artifacts and passes for composable generation pipelines.
 */

import type { Configuration, RandomSource } from "@delve/contracts";
import type { Dimensions } from "../../core/geometry/types";
import type { AnyArtifact, Artifact } from "./artifacts";
import type { TraceCollector, TraceEvent } from "./trace";

export * from "./artifacts";
export * from "./trace";

// =============================================================================
// PASSES
// =============================================================================

/**
 * Runtime context available to passes.
 *
 * One random source is shared by every pass of a run and consumed in pass
 * order, so a run is fully determined by the source's initial state.
 */
export interface PassContext {
  readonly rng: RandomSource;
  /** Validated configuration */
  readonly config: Configuration;
  readonly dimensions: Dimensions;
  /** Trace collector for debugging */
  readonly trace: TraceCollector;
}

/**
 * A pass transforms one artifact type into another.
 *
 * @example
 * ```typescript
 * function countRooms(): Pass<LayoutArtifact, LayoutArtifact> {
 *   return {
 *     id: "count-rooms",
 *     inputType: "layout",
 *     outputType: "layout",
 *     run(input, ctx) {
 *       ctx.trace.decision("count-rooms", "Rooms", [], input.dungeon.rooms.length, "Counted");
 *       return input;
 *     },
 *   };
 * }
 * ```
 */
export interface Pass<TIn extends AnyArtifact, TOut extends AnyArtifact> {
  readonly id: string;
  readonly inputType: TIn["type"];
  readonly outputType: TOut["type"];
  run(input: TIn, ctx: PassContext): TOut;
}

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Snapshot of intermediate pipeline state
 */
export interface PipelineSnapshot {
  readonly passId: string;
  readonly passIndex: number;
  readonly timestamp: number;
  readonly terrain?: Uint8Array;
  readonly roomCount: number;
  readonly corridorCount: number;
}

/**
 * Lightweight metrics collected after each pass.
 */
export interface PassMetrics {
  readonly passId: string;
  readonly passIndex: number;
  /** Execution duration in milliseconds */
  readonly durationMs: number;
  readonly roomCount: number;
  readonly doorwayCount: number;
  readonly corridorCount: number;
  /** Share of grid tiles that are corridor (0-1), 0 before carving */
  readonly corridorRatio: number;
}

export type PassMetricsCallback = (metrics: PassMetrics) => void;

/**
 * Successful pipeline execution result.
 * When `success` is true, `artifact` is guaranteed to be present.
 */
export interface PipelineSuccess<T extends Artifact> {
  readonly success: true;
  readonly artifact: T;
  readonly trace: readonly TraceEvent[];
  readonly snapshots: readonly PipelineSnapshot[];
  readonly durationMs: number;
}

/**
 * Failed pipeline execution result.
 * When `success` is false, `error` is guaranteed to be present.
 */
export interface PipelineFailure {
  readonly success: false;
  readonly error: Error;
  readonly trace: readonly TraceEvent[];
  readonly snapshots: readonly PipelineSnapshot[];
  readonly durationMs: number;
}

/**
 * Pipeline execution result - discriminated union.
 * Use `if (result.success)` to narrow to success/failure types.
 */
export type PipelineResult<T extends Artifact> =
  | PipelineSuccess<T>
  | PipelineFailure;

export type ProgressCallback = (progress: number, passId: string) => void;

/**
 * Pipeline execution options
 */
export interface PipelineOptions {
  /** Progress callback (percent, passId) */
  readonly onProgress?: ProgressCallback;
  /** Capture full grid snapshots after each pass (memory intensive) */
  readonly captureSnapshots?: boolean;
  /** Lightweight metrics callback after each pass */
  readonly onPassMetrics?: PassMetricsCallback;
}

/**
 * Settings fixed when a pipeline is built
 */
export interface PipelineSettings {
  readonly config: Configuration;
  readonly dimensions: Dimensions;
  /** Record trace events */
  readonly trace?: boolean;
}

/**
 * Pipeline interface
 */
export interface Pipeline<TStart extends AnyArtifact, TEnd extends AnyArtifact> {
  readonly id: string;
  readonly passIds: readonly string[];
  runSync(
    input: TStart,
    rng: RandomSource,
    options?: PipelineOptions,
  ): PipelineResult<TEnd>;
}
