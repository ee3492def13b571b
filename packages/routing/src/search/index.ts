/**
 * Shortest-path search.
 */

export * from "./priority-queue.js";
export * from "./path-finder.js";
