/**
 * Core module - foundational primitives for dungeon generation.
 */

export * from "./algorithms";
export * from "./data-structures";
export * from "./geometry";
export * from "./grid";
export * from "./hash";
