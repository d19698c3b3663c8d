/**
 * Pipeline module - composable generation pipelines.
 */

export * from "./builder";
export * from "./trace";
export * from "./types";
