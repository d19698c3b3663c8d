import { type RandomSource, rangeFromUnit, shuffleInPlace } from "./rng";

/**
 * Deterministic PRNG using the xoshiro128++ algorithm.
 *
 * - Fast 32-bit operations only (no BigInt overhead)
 * - Four 32-bit state words with SplitMix32 seeding
 * - Returns a double in [0, 1) with good distribution
 * - State can be saved/restored for perfect replayability
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

/**
 * SplitMix32 for state initialization from a single seed.
 */
function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * State type for xoshiro128++ (4 x 32-bit words)
 */
export type RngState = [number, number, number, number];

export class SeededRandom implements RandomSource {
  private s: RngState;

  constructor(seed: number) {
    const mix = splitmix32(seed >>> 0);

    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro requires at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    // Warm up to scatter initial correlation
    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;

    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  /**
   * Generate next random number in [0, 1)
   */
  next(): number {
    return this.next32() / 0x100000000;
  }

  range(min: number, max: number): number {
    return rangeFromUnit(() => this.next(), min, max);
  }

  /**
   * Fisher-Yates array shuffle
   * @returns A new shuffled array
   */
  shuffle<T>(array: readonly T[]): T[] {
    return shuffleInPlace(this, Array.from(array));
  }

  /**
   * Save internal state for exact reproduction
   */
  getState(): RngState {
    return [this.s[0], this.s[1], this.s[2], this.s[3]];
  }

  /**
   * Restore saved state
   */
  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}
