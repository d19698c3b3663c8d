/**
 * Type-safe pipeline builder DSL.
 *
 * Allows composing passes into pipelines with compile-time type checking
 * of artifact flow.
 */

import type { RandomSource } from "@delve/contracts";
import type { Grid } from "../core/grid/grid";
import { Tile } from "../core/grid/types";
import { createTraceCollector } from "./trace";
import type {
  AnyArtifact,
  Pass,
  PassContext,
  PassMetrics,
  Pipeline,
  PipelineOptions,
  PipelineResult,
  PipelineSettings,
  PipelineSnapshot,
  TraceCollector,
} from "./types";

/**
 * Runs one pass with tracing and bookkeeping around it.
 */
interface StepRunner {
  run<TIn extends AnyArtifact, TOut extends AnyArtifact>(
    pass: Pass<TIn, TOut>,
    index: number,
    input: TIn,
  ): TOut;
}

/**
 * Composed pass chain from the pipeline input to the current artifact.
 */
type Chain<TStart extends AnyArtifact, TCurrent extends AnyArtifact> = (
  input: TStart,
  runner: StepRunner,
) => TCurrent;

interface ArtifactSummary {
  readonly roomCount: number;
  readonly doorwayCount: number;
  readonly corridorCount: number;
  readonly grid?: Grid;
}

function summarizeArtifact(artifact: AnyArtifact): ArtifactSummary {
  switch (artifact.type) {
    case "empty":
      return { roomCount: 0, doorwayCount: 0, corridorCount: 0 };
    case "layout":
    case "triangulation":
      return {
        roomCount: artifact.dungeon.rooms.length,
        doorwayCount: artifact.dungeon.doorways.length,
        corridorCount: 0,
      };
    case "corridors":
      return {
        roomCount: artifact.dungeon.rooms.length,
        doorwayCount: artifact.dungeon.doorways.length,
        corridorCount: artifact.corridors.length,
      };
    case "grid":
    case "dungeon":
      return {
        roomCount: artifact.dungeon.rooms.length,
        doorwayCount: artifact.dungeon.doorways.length,
        corridorCount: artifact.corridors.length,
        grid: artifact.grid,
      };
  }
}

/**
 * Capture a snapshot of the current pipeline state
 */
function captureSnapshot(
  artifact: AnyArtifact,
  passId: string,
  passIndex: number,
): PipelineSnapshot {
  const summary = summarizeArtifact(artifact);
  return {
    passId,
    passIndex,
    timestamp: performance.now(),
    terrain: summary.grid?.getRawDataCopy(),
    roomCount: summary.roomCount,
    corridorCount: summary.corridorCount,
  };
}

/**
 * Collect lightweight metrics from the current artifact.
 * Much cheaper than full snapshots - no terrain copy.
 */
function collectPassMetrics(
  artifact: AnyArtifact,
  passId: string,
  passIndex: number,
  durationMs: number,
): PassMetrics {
  const summary = summarizeArtifact(artifact);
  const grid = summary.grid;
  const corridorRatio =
    grid === undefined ? 0 : grid.countTiles(Tile.CORRIDOR) / grid.size;

  return {
    passId,
    passIndex,
    durationMs,
    roomCount: summary.roomCount,
    doorwayCount: summary.doorwayCount,
    corridorCount: summary.corridorCount,
    corridorRatio,
  };
}

/**
 * Handle pass execution side effects (metrics, progress, snapshots)
 */
function handlePassSideEffects(
  current: AnyArtifact,
  passId: string,
  stepIndex: number,
  stepDuration: number,
  totalSteps: number,
  snapshots: PipelineSnapshot[],
  shouldCaptureSnapshots: boolean,
  options?: PipelineOptions,
): void {
  if (shouldCaptureSnapshots) {
    snapshots.push(captureSnapshot(current, passId, stepIndex));
  }

  if (options?.onPassMetrics) {
    options.onPassMetrics(
      collectPassMetrics(current, passId, stepIndex, stepDuration),
    );
  }

  if (options?.onProgress) {
    const progress = Math.round(((stepIndex + 1) / totalSteps) * 100);
    options.onProgress(progress, passId);
  }
}

/**
 * Build error result
 */
function buildErrorResult<T extends AnyArtifact>(
  error: unknown,
  failedStep: { readonly index: number; readonly passId: string } | undefined,
  trace: TraceCollector,
  snapshots: readonly PipelineSnapshot[],
  startTime: number,
): PipelineResult<T> {
  const originalError =
    error instanceof Error ? error : new Error(String(error));

  const stepIndex = failedStep?.index ?? -1;
  const passId = failedStep?.passId ?? "unknown";
  const enhancedError = new Error(
    `Pipeline failed at step ${stepIndex} (pass: ${passId}): ${originalError.message}`,
  );
  enhancedError.cause = originalError;

  return {
    success: false,
    error: enhancedError,
    trace: trace.getEvents(),
    snapshots,
    durationMs: performance.now() - startTime,
  };
}

/**
 * Synchronous pipeline execution.
 */
function runPipelineSync<
  TStart extends AnyArtifact,
  TCurrent extends AnyArtifact,
>(
  chain: Chain<TStart, TCurrent>,
  totalSteps: number,
  settings: PipelineSettings,
  input: TStart,
  rng: RandomSource,
  options?: PipelineOptions,
): PipelineResult<TCurrent> {
  const startTime = performance.now();
  const trace = createTraceCollector(settings.trace ?? false);
  const snapshots: PipelineSnapshot[] = [];
  const shouldCaptureSnapshots = options?.captureSnapshots ?? false;

  const ctx: PassContext = {
    rng,
    config: settings.config,
    dimensions: settings.dimensions,
    trace,
  };

  const position: { step?: { index: number; passId: string } } = {};

  const runner: StepRunner = {
    run<TIn extends AnyArtifact, TOut extends AnyArtifact>(
      pass: Pass<TIn, TOut>,
      index: number,
      current: TIn,
    ): TOut {
      position.step = { index, passId: pass.id };
      trace.start(pass.id);
      const stepStart = performance.now();

      const output = pass.run(current, ctx);

      const stepDuration = performance.now() - stepStart;
      trace.end(pass.id, stepDuration);
      trace.artifact(pass.id, output);
      handlePassSideEffects(
        output,
        pass.id,
        index,
        stepDuration,
        totalSteps,
        snapshots,
        shouldCaptureSnapshots,
        options,
      );
      return output;
    },
  };

  try {
    const artifact = chain(input, runner);
    return {
      success: true,
      artifact,
      trace: trace.getEvents(),
      snapshots,
      durationMs: performance.now() - startTime,
    };
  } catch (error) {
    return buildErrorResult<TCurrent>(
      error,
      position.step,
      trace,
      snapshots,
      startTime,
    );
  }
}

/**
 * Pipeline builder for composing passes.
 *
 * Type parameters:
 * - TStart: The input artifact type for the pipeline
 * - TCurrent: The current output artifact type (evolves as passes are added)
 */
export class PipelineBuilder<
  TStart extends AnyArtifact,
  TCurrent extends AnyArtifact,
> {
  private readonly id: string;
  private readonly settings: PipelineSettings;
  private readonly passIds: readonly string[];
  private readonly chain: Chain<TStart, TCurrent>;

  private constructor(
    id: string,
    settings: PipelineSettings,
    passIds: readonly string[],
    chain: Chain<TStart, TCurrent>,
  ) {
    this.id = id;
    this.settings = settings;
    this.passIds = passIds;
    this.chain = chain;
  }

  /**
   * Create a new pipeline builder
   */
  static create<TStart extends AnyArtifact>(
    id: string,
    settings: PipelineSettings,
  ): PipelineBuilder<TStart, TStart> {
    return new PipelineBuilder<TStart, TStart>(id, settings, [], (input) => input);
  }

  /**
   * Add a pass to the pipeline.
   */
  pipe<TNext extends AnyArtifact>(
    pass: Pass<TCurrent, TNext>,
  ): PipelineBuilder<TStart, TNext> {
    const previous = this.chain;
    const index = this.passIds.length;
    const chain: Chain<TStart, TNext> = (input, runner) =>
      runner.run(pass, index, previous(input, runner));

    return new PipelineBuilder<TStart, TNext>(
      this.id,
      this.settings,
      [...this.passIds, pass.id],
      chain,
    );
  }

  /**
   * Build the final pipeline
   */
  build(): Pipeline<TStart, TCurrent> {
    const chain = this.chain;
    const settings = this.settings;
    const passIds = [...this.passIds];

    return {
      id: this.id,
      passIds,

      runSync(
        input: TStart,
        rng: RandomSource,
        options?: PipelineOptions,
      ): PipelineResult<TCurrent> {
        return runPipelineSync<TStart, TCurrent>(
          chain,
          passIds.length,
          settings,
          input,
          rng,
          options,
        );
      },
    };
  }
}

/**
 * Convenience function to create a pipeline
 */
export function createPipeline<TStart extends AnyArtifact>(
  id: string,
  settings: PipelineSettings,
): PipelineBuilder<TStart, TStart> {
  return PipelineBuilder.create<TStart>(id, settings);
}
