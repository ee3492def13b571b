export * from "./simulation.js";
export * from "./views.js";
export * from "./random.js";
