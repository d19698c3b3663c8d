/**
 * Error codes for dungeon generation operations.
 */
export type DungeonErrorCode =
  | "CONFIG_INVALID"
  | "CONFIG_DIMENSION_TOO_SMALL"
  | "LAYOUT_INVALID";

/**
 * Unified error type for all dungeon generation operations.
 *
 * @example
 * ```typescript
 * const error = new DungeonError(
 *   "CONFIG_DIMENSION_TOO_SMALL",
 *   "Grid cannot fit a single padded room",
 *   { width: 8, height: 8 }
 * );
 * ```
 */
export class DungeonError extends Error {
  override readonly name = "DungeonError";

  constructor(
    public readonly code: DungeonErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DungeonError);
    }
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): DungeonError {
    return new DungeonError("CONFIG_INVALID", message, details);
  }

  static dimensionTooSmall(
    message: string,
    details?: Record<string, unknown>,
  ): DungeonError {
    return new DungeonError("CONFIG_DIMENSION_TOO_SMALL", message, details);
  }

  static layoutInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): DungeonError {
    return new DungeonError("LAYOUT_INVALID", message, details);
  }

  static isDungeonError(error: unknown): error is DungeonError {
    return error instanceof DungeonError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: DungeonErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
