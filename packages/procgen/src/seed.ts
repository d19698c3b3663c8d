/**
 * Seed Creation Utilities
 */

import { randomUint32 } from "@delve/contracts";

/**
 * Fresh unsigned 32-bit seed from the platform's random source
 */
export function randomSeed(): number {
  return randomUint32();
}

/**
 * Seed from a string (DJB2 hash)
 */
export function seedFromString(input: string): number {
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return hash;
}
