/**
 * Core domain objects: locations, roads and the cars driving them.
 */

export * from "./vertex.js";
export * from "./edge.js";
export * from "./car.js";
export * from "./errors.js";
