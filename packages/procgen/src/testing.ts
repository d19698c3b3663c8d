/**
 * Testing utilities for dungeon generation.
 * Separated from validation.ts to avoid circular dependencies.
 */

import type { RandomSource } from "@delve/contracts";
import { generate } from "./api";

// =============================================================================
// SCRIPTED RANDOM SOURCES
// =============================================================================

/**
 * Always draws the lower bound
 */
export class MinRandom implements RandomSource {
  range(min: number, _max: number): number {
    return min;
  }
}

/**
 * Always draws the upper bound
 */
export class MaxRandom implements RandomSource {
  range(_min: number, max: number): number {
    return max;
  }
}

/**
 * Replays a fixed list of numbers, wrapping around at the end.
 *
 * Values are returned as given, without clamping to the requested
 * range, so a script fully determines every decision.
 */
export class ScriptedRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {
    if (values.length === 0) {
      throw new Error("ScriptedRandom needs at least one value");
    }
  }

  range(_min: number, _max: number): number {
    this.index %= this.values.length;
    const value = this.values[this.index] ?? 0;
    this.index++;
    return value;
  }

  /** Number of draws taken so far, modulo the script length */
  get position(): number {
    return this.index;
  }
}

// =============================================================================
// DETERMINISM TESTING
// =============================================================================

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly input: unknown,
  ) {
    super(
      `Non-deterministic generation detected: produced ${checksums.length} different checksums for the same seed`,
    );
    this.name = "DeterminismViolationError";
  }
}

/**
 * Assert that generation produces deterministic output.
 *
 * Runs generation multiple times with the same seed and verifies
 * all runs produce identical checksums.
 *
 * @throws {DeterminismViolationError} If different runs produce different checksums
 *
 * @example
 * ```typescript
 * it("is deterministic", () => {
 *   assertDeterministic({ width: 100, height: 80, seed: 12345 });
 * });
 * ```
 */
export function assertDeterministic(input: unknown, runs: number = 3): void {
  const { uniqueChecksums } = testDeterminism(input, runs);
  if (uniqueChecksums.length > 1) {
    throw new DeterminismViolationError(uniqueChecksums, input);
  }
}

/**
 * Test determinism and return detailed results instead of throwing.
 */
export function testDeterminism(
  input: unknown,
  runs: number = 3,
): {
  deterministic: boolean;
  checksums: string[];
  uniqueChecksums: string[];
  durations: number[];
  avgDuration: number;
} {
  const checksums: string[] = [];
  const durations: number[] = [];

  for (let i = 0; i < runs; i++) {
    const result = generate(input);

    if (!result.success) {
      throw new Error(
        `Generation failed on run ${i + 1}: ${result.error.message}`,
      );
    }

    checksums.push(result.artifact.checksum);
    durations.push(result.durationMs);
  }

  const uniqueChecksums = [...new Set(checksums)];
  const avgDuration =
    durations.length > 0
      ? durations.reduce((a, b) => a + b, 0) / durations.length
      : 0;

  return {
    deterministic: uniqueChecksums.length === 1,
    checksums,
    uniqueChecksums,
    durations,
    avgDuration,
  };
}
