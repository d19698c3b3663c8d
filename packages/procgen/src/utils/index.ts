/**
 * Utilities module - text grid codec and debug rendering.
 */

export * from "./ascii-renderer";
