/**
 * @town-sim/types
 *
 * Shared types for the town routing simulation.
 *
 * - Town: locations and weighted one-way roads
 * - Views: JSON-safe snapshots of vertices, edges and cars
 * - Tick: batched mutations from a driving loop
 */

export * from "./town.js";
export * from "./views.js";
export * from "./tick.js";
