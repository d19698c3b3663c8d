/**
 * A Result type for explicit, type-safe error handling.
 *
 * A plain discriminated union: narrow with `if (result.success)`.
 *
 * @example
 * ```typescript
 * const resolved = resolveConfiguration({ mazeChance: 0.5 });
 * if (!resolved.success) {
 *   throw resolved.error;
 * }
 * const configuration = resolved.value;
 * ```
 */
export interface OkResult<T> {
  readonly success: true;
  readonly value: T;
}

export interface ErrResult<E> {
  readonly success: false;
  readonly error: E;
}

export type Result<T, E> = OkResult<T> | ErrResult<E>;

/**
 * Create a successful Result containing a value.
 */
export function Ok<T>(value: T): OkResult<T> {
  return { success: true, value };
}

/**
 * Create a failed Result containing an error.
 */
export function Err<E>(error: E): ErrResult<E> {
  return { success: false, error };
}

/**
 * Unwrap the value or throw the carried error.
 */
export function getOrThrow<T, E>(result: Result<T, E>): T {
  if (result.success) {
    return result.value;
  }
  throw result.error;
}
