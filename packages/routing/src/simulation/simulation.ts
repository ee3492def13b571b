/**
 * Id-based facade over a town, for collaborators that should not hold live
 * objects: renderers, the HTTP API and driving loops.
 *
 * Queries return JSON-safe views; mutations take names and ids and throw
 * the core's RoutingErrors.
 */

import type {
  CarView,
  EdgeView,
  Position,
  TickRequest,
  TickResult,
  TownDescription,
  TownEventView,
  TownSnapshot,
  VertexView,
} from "@town-sim/types";

import type { Car } from "../domain/car.js";
import { parseEdgeId, type Edge } from "../domain/edge.js";
import { UnknownEdgeError } from "../domain/errors.js";
import { townFromDescription } from "../config/town-config.js";
import type { AddCarOptions, Town, TownOptions } from "../town/town.js";
import { finiteOrNull, toCarView, toEdgeView, toVertexView } from "./views.js";

export interface SimulationOptions {
  /** Number of recent events kept for {@link Simulation.recentEvents} (default 100) */
  eventLogSize?: number;
}

/** An edge by id (`<from>-><to>`) or by endpoint names */
export type EdgeRef = string | { from: string; to: string };

export interface VertexRemovalView {
  vertex: string;
  removedEdges: string[];
  rerouted: CarView[];
  evicted: string[];
}

export interface EdgeUpdateView {
  edge: EdgeView;
  rerouted: CarView[];
}

export class Simulation {
  private readonly events: TownEventView[] = [];
  private readonly eventLogSize: number;

  constructor(
    readonly town: Town,
    options: SimulationOptions = {},
  ) {
    this.eventLogSize = options.eventLogSize ?? 100;

    town.on("edge-weight-changed", ({ edge, previousWeight, weight }) =>
      this.record({
        type: "edge-weight-changed",
        edge: edge.id,
        previousWeight: finiteOrNull(previousWeight),
        weight: finiteOrNull(weight),
      }),
    );
    town.on("car-rerouted", ({ car, previousPath, path, cause }) =>
      this.record({
        type: "car-rerouted",
        car: car.id,
        previousPath: previousPath.map((edge) => edge.id),
        path: path.map((edge) => edge.id),
        cause: cause?.id ?? null,
      }),
    );
    town.on("car-stranded", ({ car }) => this.record({ type: "car-stranded", car: car.id }));
    town.on("car-arrived", ({ car }) =>
      this.record({ type: "car-arrived", car: car.id, vertex: car.destination.name }),
    );
    town.on("car-evicted", ({ car, vertex }) =>
      this.record({ type: "car-evicted", car: car.id, vertex: vertex.name }),
    );
  }

  static fromDescription(
    description: TownDescription,
    options: TownOptions & SimulationOptions = {},
  ): Simulation {
    return new Simulation(townFromDescription(description, options), options);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  snapshot(): TownSnapshot {
    return {
      vertices: this.listVertices(),
      edges: this.listEdges(),
      cars: this.listCars(),
    };
  }

  listVertices(): VertexView[] {
    return this.town.listVertices().map(toVertexView);
  }

  listEdges(): EdgeView[] {
    return this.town.listEdges().map(toEdgeView);
  }

  listCars(): CarView[] {
    return this.town.listCars().map(toCarView);
  }

  getEdge(ref: EdgeRef): EdgeView {
    return toEdgeView(this.resolveEdge(ref));
  }

  getCar(id: string): CarView {
    return toCarView(this.town.getCar(id));
  }

  /** Most recent events, oldest first */
  recentEvents(limit = this.eventLogSize): TownEventView[] {
    return limit > 0 ? this.events.slice(-limit) : [];
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  addVertex(name: string, position?: Position): VertexView {
    return toVertexView(this.town.addVertex(name, position));
  }

  removeVertex(name: string): VertexRemovalView {
    const removal = this.town.removeVertex(name);
    return {
      vertex: removal.vertex.name,
      removedEdges: removal.removedEdges.map((edge) => edge.id),
      rerouted: removal.reroutedCars.map(toCarView),
      evicted: removal.evictedCars.map((car) => car.id),
    };
  }

  connect(from: string, to: string, weight: number): EdgeView {
    return toEdgeView(this.town.connectVertices(from, to, weight));
  }

  disconnect(ref: EdgeRef): { edge: string; rerouted: CarView[] } {
    const edge = this.resolveEdge(ref);
    const removal = this.town.disconnectVertices(edge.start.name, edge.end.name);
    return { edge: removal.edge.id, rerouted: removal.reroutedCars.map(toCarView) };
  }

  setEdgeWeight(ref: EdgeRef, weight: number): EdgeUpdateView {
    const edge = this.resolveEdge(ref);
    const rerouted = this.town.updateWeight(edge, weight);
    return { edge: toEdgeView(edge), rerouted: rerouted.map(toCarView) };
  }

  addCar(start: string, destination: string, options: AddCarOptions = {}): CarView {
    return toCarView(this.town.addCar(start, destination, options));
  }

  removeCar(id: string): void {
    this.town.removeCar(this.town.getCar(id));
  }

  departCar(id: string): CarView {
    const car = this.town.getCar(id);
    this.town.departCar(car);
    return toCarView(car);
  }

  advanceCar(id: string): CarView {
    const car = this.town.getCar(id);
    this.town.crossEdge(car);
    return toCarView(car);
  }

  rerouteCar(id: string): CarView {
    return toCarView(this.town.rerouteCar(this.town.getCar(id)));
  }

  /**
   * Apply one driving-loop tick.
   *
   * Every referenced edge and car is resolved first, so an unknown id
   * rejects the tick before anything changes. Weight changes then land as
   * one batch, and cars advance in order. A car with no road left when its
   * turn comes (stranded by this tick's changes, or advanced past its
   * destination) is reported as stalled rather than failing the tick.
   */
  applyTick(request: TickRequest): TickResult {
    const updates = (request.weightChanges ?? []).map((change) => ({
      edge: this.resolveEdge(change.edge),
      weight: change.weight ?? Infinity,
    }));
    const cars: Car[] = (request.advances ?? []).map((id) => this.town.getCar(id));

    const rerouted = this.town.updateWeights(updates);

    const advanced: CarView[] = [];
    const stalled: string[] = [];
    for (const car of cars) {
      if (!car.currentEdge) {
        stalled.push(car.id);
        continue;
      }
      this.town.crossEdge(car);
      advanced.push(toCarView(car));
    }

    console.log(
      `[simulation] Tick: ${updates.length} weight change(s), ${rerouted.length} rerouted, ${advanced.length} advanced, ${stalled.length} stalled`,
    );

    const changedEdges = [...new Set(updates.map((update) => update.edge))];
    return {
      edges: changedEdges.map(toEdgeView),
      rerouted: rerouted.map(toCarView),
      advanced,
      stalled,
    };
  }

  private resolveEdge(ref: EdgeRef): Edge {
    if (typeof ref === "string") {
      const names = parseEdgeId(ref);
      if (!names) throw new UnknownEdgeError(ref);
      return this.town.getEdge(names.from, names.to);
    }
    return this.town.getEdge(ref.from, ref.to);
  }

  private record(event: TownEventView): void {
    this.events.push(event);
    if (this.events.length > this.eventLogSize) this.events.shift();
  }
}
