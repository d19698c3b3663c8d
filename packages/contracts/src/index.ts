export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/configuration";
export * from "./types/configuration";
export * from "./types/error";
export * from "./types/result";
export * from "./utils/builder";
