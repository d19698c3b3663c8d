/**
 * Hash utilities module
 *
 * Provides FNV-64 hashing and dungeon checksum calculation.
 */

export * from "./checksum";
export * from "./fnv64";
