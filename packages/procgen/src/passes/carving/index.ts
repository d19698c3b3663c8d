export * from "./a-star";
export * from "./grid-construction";
