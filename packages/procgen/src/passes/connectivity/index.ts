export * from "./corridor-selection";
export * from "./triangulation";
