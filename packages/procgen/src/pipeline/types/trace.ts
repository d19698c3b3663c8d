/**
 * Pipeline Trace & Debug Types
 *
 * Types for tracing generation decisions and debugging.
 */

import type { AnyArtifact } from "./artifacts";

/**
 * Trace event types
 */
export type TraceEventType =
  | "start"
  | "end"
  | "decision"
  | "artifact"
  | "warning";

/**
 * Base trace event
 */
export interface TraceEvent {
  readonly timestamp: number;
  readonly passId: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

/**
 * Trace collector interface
 */
export interface TraceCollector {
  readonly enabled: boolean;
  start(passId: string): void;
  end(passId: string, durationMs: number): void;
  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(passId: string, message: string): void;
  artifact(passId: string, artifact: AnyArtifact): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}
