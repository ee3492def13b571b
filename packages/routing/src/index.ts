/**
 * @town-sim/routing
 *
 * Routing core for a town of cars that replan as road conditions change.
 *
 * Key concepts:
 * - Town: owner of vertices (locations), edges (one-way roads) and cars
 * - Path finder: Dijkstra over current edge weights
 * - Car: follows its path; rerouted when its current road's weight changes
 * - Simulation: id-based facade with views, event log and ticks
 *
 * Flow:
 * 1. Build a town from an adjacency description (or a town config)
 * 2. Add cars -> each gets a shortest path
 * 3. Change weights -> cars on the changed roads replan
 * 4. Advance cars edge by edge until they arrive
 */

// Domain types
export * from "./domain/index.js";

// Modules
export * from "./search/index.js";
export * from "./town/index.js";
export * from "./config/town-config.js";
export * from "./simulation/index.js";
