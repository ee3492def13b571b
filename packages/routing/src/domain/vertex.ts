import type { Position } from "@town-sim/types";
import type { Edge } from "./edge.js";

/**
 * A named location in a town.
 *
 * Outgoing edges are kept in declaration order; the path finder walks them
 * in that order, so it decides which of two equal-cost routes wins.
 */
export class Vertex {
  /** Outgoing edges, owned by the town (mutate only through it) */
  readonly outgoing: Edge[] = [];

  constructor(
    readonly name: string,
    /** Render-only payload */
    readonly position: Position,
    /** Insertion rank within the owning town; Dijkstra tie-break */
    readonly rank: number,
  ) {}

  /** Outgoing edge to `end`, if any */
  edgeTo(end: Vertex): Edge | undefined {
    return this.outgoing.find((edge) => edge.end === end);
  }
}
