import type { CarStatus } from "@town-sim/types";
import { findPath, pathCost } from "../search/path-finder.js";
import { NotTravelingError } from "./errors.js";
import type { Edge } from "./edge.js";
import type { Vertex } from "./vertex.js";
import type { Town } from "../town/town.js";

/** Where a car is: waiting at a vertex, or part-way along an edge */
export type CarPosition =
  | { kind: "at-vertex"; vertex: Vertex }
  | { kind: "on-edge"; edge: Edge };

/** Result of recomputing a car's path */
export interface Reroute {
  previousPath: readonly Edge[];
  path: readonly Edge[];
}

/**
 * An agent driving from a fixed origin to a fixed destination.
 *
 * The path runs from the car's current position to its destination, current
 * road first. A car is assigned (in the edge's car set) to `path[0]` only.
 * Once on an edge it never leaves it before crossing: rerouting keeps the
 * traversed edge and recomputes what comes after it.
 *
 * State changes go through the owning {@link Town}, which emits events and
 * checks ownership; the methods here do the bookkeeping.
 */
export class Car {
  private currentPath: Edge[] = [];
  private currentPosition: CarPosition;

  constructor(
    readonly id: string,
    readonly origin: Vertex,
    readonly destination: Vertex,
    readonly town: Town,
  ) {
    this.currentPosition = { kind: "at-vertex", vertex: origin };
  }

  get path(): readonly Edge[] {
    return this.currentPath;
  }

  get position(): CarPosition {
    return this.currentPosition;
  }

  /** The road the car is on or about to take */
  get currentEdge(): Edge | undefined {
    return this.currentPath[0];
  }

  /** The vertex the car's path ends at (its vertex when the path is empty) */
  get endpoint(): Vertex {
    const last = this.currentPath[this.currentPath.length - 1];
    if (last) return last.end;
    return this.currentPosition.kind === "at-vertex"
      ? this.currentPosition.vertex
      : this.currentPosition.edge.end;
  }

  get status(): CarStatus {
    if (this.endpoint !== this.destination) return "stranded";
    return this.currentPath.length === 0 ? "arrived" : "en-route";
  }

  /** Sum of the remaining edges' weights */
  get remainingCost(): number {
    return pathCost(this.currentPath);
  }

  /**
   * Recompute the path from the current position using current weights.
   *
   * At a vertex the whole path is replaced. On an edge the traversed edge
   * stays first (and stays assigned); only the continuation is recomputed.
   */
  reroute(): Reroute {
    const previousPath = this.currentPath;
    const origin =
      this.currentPosition.kind === "on-edge" ? this.currentPosition.edge : this.currentPosition.vertex;
    const kept = this.currentPosition.kind === "on-edge" ? this.currentPosition.edge : undefined;

    const path = findPath(origin, this.destination);
    for (const edge of previousPath) {
      if (edge !== kept) edge.detach(this);
    }
    this.currentPath = path;
    path[0]?.attach(this);

    return { previousPath, path };
  }

  /**
   * Start along the current edge. No-op when already on it.
   * @throws NotTravelingError when the path is empty
   */
  depart(): Edge {
    const edge = this.currentPath[0];
    if (!edge) throw new NotTravelingError(this.id);
    this.currentPosition = { kind: "on-edge", edge };
    return edge;
  }

  /**
   * Finish the current edge: leave it, stand at its end vertex and take up
   * the next edge, if any.
   * @throws NotTravelingError when the path is empty
   */
  crossEdge(): Edge {
    const [edge, ...rest] = this.currentPath;
    if (!edge) throw new NotTravelingError(this.id);

    edge.detach(this);
    this.currentPath = rest;
    this.currentPosition = { kind: "at-vertex", vertex: edge.end };
    rest[0]?.attach(this);
    return edge;
  }

  /** Drop out of every edge's car set */
  detachAll(): void {
    for (const edge of this.currentPath) {
      edge.detach(this);
    }
    this.currentPath = [];
  }
}
