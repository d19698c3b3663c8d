export * from "./maze-carving";
