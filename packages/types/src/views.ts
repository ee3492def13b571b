/**
 * Read-only views of a running simulation.
 *
 * These are plain JSON-safe objects handed to collaborators (renderers, the
 * HTTP API, driving loops). They are snapshots: mutating them has no effect
 * on the simulation.
 */

import type { Position } from "./town.js";

/** Where a car is right now */
export type CarStatus = "en-route" | "arrived" | "stranded";

/** Position of a car: waiting at a location, or part-way along a road */
export type CarPositionView =
  | { kind: "at-vertex"; vertex: string }
  | { kind: "on-edge"; edge: string };

export interface VertexView {
  name: string;
  position: Position;
  /** Ids of outgoing roads, in declaration order */
  roads: string[];
}

export interface EdgeView {
  /** `<from>-><to>` */
  id: string;
  from: string;
  to: string;
  /** Traversal cost; null when the road is closed */
  weight: number | null;
  closed: boolean;
  /** Ids of cars whose current road this is */
  cars: string[];
}

export interface CarView {
  id: string;
  origin: string;
  destination: string;
  status: CarStatus;
  position: CarPositionView;
  /** Remaining road ids, current road first */
  path: string[];
  /** Sum of the remaining roads' weights; null if any is closed */
  remainingCost: number | null;
}

export interface TownSnapshot {
  vertices: VertexView[];
  edges: EdgeView[];
  cars: CarView[];
}

/** Serializable record of something that happened in a town */
export type TownEventView =
  | { type: "edge-weight-changed"; edge: string; previousWeight: number | null; weight: number | null }
  | { type: "car-rerouted"; car: string; previousPath: string[]; path: string[]; cause: string | null }
  | { type: "car-stranded"; car: string }
  | { type: "car-arrived"; car: string; vertex: string }
  | { type: "car-evicted"; car: string; vertex: string };
