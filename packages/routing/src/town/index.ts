export * from "./town.js";
export * from "./build-town.js";
export * from "./invariants.js";
