/**
 * Random source contract and helpers built on top of it.
 *
 * Every stage of the generator draws randomness exclusively through
 * `RandomSource.range`, so a test can substitute a scripted source and
 * replay an exact sequence of decisions.
 */

/**
 * Capability exposing inclusive integer draws.
 */
export interface RandomSource {
  /**
   * Random integer between min and max (inclusive)
   * @param min - The minimum value
   * @param max - The maximum value
   */
  range(min: number, max: number): number;
}

/**
 * Random integer between min and max (inclusive) from a [0, 1) generator
 * @param next - Random number generator function (returns 0 to 1)
 * @param min - The minimum value
 * @param max - The maximum value
 */
export function rangeFromUnit(
  next: () => number,
  min: number,
  max: number,
): number {
  return Math.floor(next() * (max - min + 1)) + min;
}

/**
 * Fisher-Yates shuffle, in place, drawing only through `range`.
 * @returns The same array, shuffled
 */
export function shuffleInPlace<T>(rng: RandomSource, array: T[]): T[] {
  for (let i = array.length - 1; i > 0; i--) {
    const j = rng.range(0, i);
    const temp = array[i] as T;
    array[i] = array[j] as T;
    array[j] = temp;
  }
  return array;
}

/** Resolution used to express a [0, 1] probability as an integer draw. */
export const CHANCE_RESOLUTION = 10_000;

/**
 * Boolean with given probability, expressed as one integer draw.
 * A chance of 0 never succeeds and a chance of 1 always does.
 */
export function chance(rng: RandomSource, probability: number): boolean {
  const threshold = Math.round(probability * CHANCE_RESOLUTION);
  return rng.range(0, CHANCE_RESOLUTION - 1) < threshold;
}
