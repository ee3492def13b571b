/**
 * Tick batches - the unit of work a driving loop hands to a simulation.
 *
 * Weight changes in a tick are applied together before any car is rerouted,
 * then cars advance in the order listed.
 */

import type { CarView, EdgeView } from "./views.js";

export interface WeightChange {
  /** `<from>-><to>` */
  edge: string;
  /** `null` closes the road */
  weight: number | null;
}

export interface TickRequest {
  weightChanges?: WeightChange[];
  /** Car ids to move across their current road, in order */
  advances?: string[];
}

export interface TickResult {
  /** Every edge named in the request, once each, after the changes */
  edges: EdgeView[];
  /** Cars rerouted by the weight changes */
  rerouted: CarView[];
  /** Cars after advancing, in request order */
  advanced: CarView[];
  /** Ids of cars that had no road left when their turn came */
  stalled: string[];
}
