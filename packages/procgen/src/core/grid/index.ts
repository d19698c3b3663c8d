/**
 * Grid module - tile grid storage.
 */

export { Grid } from "./grid";
export * from "./types";
