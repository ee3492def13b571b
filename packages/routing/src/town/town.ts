/**
 * The town: owner of every vertex, edge and car.
 *
 * All mutations go through here so that the two sides of the car/edge
 * association (an edge's car set, a car's path) never drift apart. Methods
 * are synchronous and run to completion, which is what serializes weight
 * updates, car moves and removals against one another.
 */

import { EventEmitter } from "node:events";
import type { Position } from "@town-sim/types";

import { Car } from "../domain/car.js";
import { Edge, edgeId, isValidVertexName } from "../domain/edge.js";
import {
  DuplicateEdgeError,
  DuplicateNameError,
  InvalidNameError,
  InvariantViolationError,
  UnknownCarError,
  UnknownEdgeError,
  UnknownVertexError,
  UnreachableError,
  assertValidWeight,
} from "../domain/errors.js";
import { Vertex } from "../domain/vertex.js";
import { checkTownInvariants } from "./invariants.js";

export interface TownOptions {
  /** Re-check car/edge bookkeeping after every mutation (debug aid) */
  verifyInvariants?: boolean;
}

/**
 * Events a town announces, in the order the mutations happen. Payloads carry
 * the values as of the moment of the change, since listeners run only once
 * the whole mutation is done.
 */
export interface TownEventMap {
  "edge-weight-changed": { edge: Edge; previousWeight: number; weight: number };
  "car-rerouted": { car: Car; previousPath: readonly Edge[]; path: readonly Edge[]; cause?: Edge };
  "car-stranded": { car: Car };
  "car-arrived": { car: Car };
  "car-evicted": { car: Car; vertex: Vertex };
}

export type TownEventName = keyof TownEventMap;

export interface WeightUpdate {
  edge: Edge;
  weight: number;
}

export interface AddCarOptions {
  /** Fail with UnreachableError instead of adding a stranded car */
  requireRoute?: boolean;
}

export interface VertexRemoval {
  vertex: Vertex;
  removedEdges: Edge[];
  reroutedCars: Car[];
  evictedCars: Car[];
}

export interface EdgeRemoval {
  edge: Edge;
  reroutedCars: Car[];
}

const ORIGIN: Position = { x: 0, y: 0 };

export class Town {
  readonly verifyInvariants: boolean;

  private readonly vertices = new Map<string, Vertex>();
  private readonly cars = new Map<string, Car>();
  private readonly emitter = new EventEmitter();
  private pending: (() => void)[] = [];
  private nextRank = 0;
  private nextCarNumber = 1;

  constructor(options: TownOptions = {}) {
    this.verifyInvariants = options.verifyInvariants ?? false;
  }

  /**
   * Subscribe to a town event; returns the unsubscribe function.
   *
   * Events are queued while a mutation runs and delivered after it has
   * finished, so a listener always sees a consistent town. A listener that
   * throws makes the mutation's call throw, but the change itself has
   * already been applied and the remaining events are still delivered.
   */
  on<K extends TownEventName>(event: K, listener: (payload: TownEventMap[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Vertices
  // ---------------------------------------------------------------------------

  /** @throws InvalidNameError for an empty name or one containing "->" */
  addVertex(name: string, position: Position = ORIGIN): Vertex {
    if (!isValidVertexName(name)) throw new InvalidNameError(name);
    if (this.vertices.has(name)) throw new DuplicateNameError(name);
    const vertex = new Vertex(name, { ...position }, this.nextRank++);
    this.vertices.set(name, vertex);
    return vertex;
  }

  findVertex(name: string): Vertex | undefined {
    return this.vertices.get(name);
  }

  getVertex(name: string): Vertex {
    const vertex = this.vertices.get(name);
    if (!vertex) throw new UnknownVertexError(name);
    return vertex;
  }

  listVertices(): Vertex[] {
    return [...this.vertices.values()];
  }

  /**
   * Remove a vertex and every edge touching it.
   *
   * Cars that cannot survive (standing on the vertex, heading into it along
   * an edge, or bound for it) are evicted. A car leaving the vertex along a
   * removed edge finishes that edge. Every other car whose path used a
   * removed edge is rerouted, and may end up stranded.
   */
  removeVertex(name: string): VertexRemoval {
    const vertex = this.getVertex(name);
    const removedEdges = [
      ...vertex.outgoing,
      ...this.listEdges().filter((edge) => edge.end === vertex && edge.start !== vertex),
    ];
    const { reroutedCars, evictedCars } = this.dropEdges(new Set(removedEdges), vertex);
    return { vertex, removedEdges, reroutedCars, evictedCars };
  }

  // ---------------------------------------------------------------------------
  // Edges
  // ---------------------------------------------------------------------------

  /**
   * Add a one-way road. Stranded cars are rerouted afterwards, since the new
   * road may give them a way through.
   */
  connectVertices(fromName: string, toName: string, weight: number): Edge {
    assertValidWeight(weight);
    const from = this.getVertex(fromName);
    const to = this.getVertex(toName);
    if (from.edgeTo(to)) throw new DuplicateEdgeError(edgeId(fromName, toName));

    const edge = new Edge(from, to, weight);
    from.outgoing.push(edge);

    for (const car of this.listCars()) {
      if (car.status === "stranded") this.reroute(car, edge);
    }
    this.settle();
    return edge;
  }

  findEdge(fromName: string, toName: string): Edge | undefined {
    const from = this.vertices.get(fromName);
    const to = this.vertices.get(toName);
    if (!from || !to) return undefined;
    return from.edgeTo(to);
  }

  getEdge(fromName: string, toName: string): Edge {
    const edge = this.findEdge(fromName, toName);
    if (!edge) throw new UnknownEdgeError(edgeId(fromName, toName));
    return edge;
  }

  /** Every edge, grouped by start vertex in insertion order */
  listEdges(): Edge[] {
    return this.listVertices().flatMap((vertex) => vertex.outgoing);
  }

  /**
   * Remove one road. A car part-way along it finishes it; cars that planned
   * to take it are rerouted.
   */
  disconnectVertices(fromName: string, toName: string): EdgeRemoval {
    const edge = this.getEdge(fromName, toName);
    const { reroutedCars } = this.dropEdges(new Set([edge]));
    return { edge, reroutedCars };
  }

  /**
   * Set one edge's weight and reroute the cars assigned to it.
   * Setting the current weight again changes nothing.
   * @returns the rerouted cars
   */
  updateWeight(edge: Edge, weight: number): Car[] {
    return this.updateWeights([{ edge, weight }]);
  }

  /**
   * Apply several weight changes as one step.
   *
   * Everything is validated before anything changes. All weights are set
   * before any car is rerouted, so no car plans against a half-applied batch,
   * and each affected car is rerouted once.
   * @returns the rerouted cars
   */
  updateWeights(updates: readonly WeightUpdate[]): Car[] {
    for (const { edge, weight } of updates) {
      assertValidWeight(weight);
      this.assertLiveEdge(edge);
    }

    const changed = new Set<Edge>();
    for (const { edge, weight } of updates) {
      const previousWeight = edge.weight;
      if (previousWeight === weight) continue;
      edge.setWeight(weight);
      changed.add(edge);
      this.emit("edge-weight-changed", { edge, previousWeight, weight });
    }

    const affected = new Map<Car, Edge>();
    for (const edge of changed) {
      for (const car of edge.cars) {
        if (!affected.has(car)) affected.set(car, edge);
      }
    }
    for (const [car, cause] of affected) {
      this.reroute(car, cause);
    }

    this.settle();
    return [...affected.keys()];
  }

  // ---------------------------------------------------------------------------
  // Cars
  // ---------------------------------------------------------------------------

  /**
   * Register a car at `startName` and plan its route.
   *
   * An unreachable destination leaves the car stranded with an empty path,
   * unless `requireRoute` is set, in which case nothing is registered.
   */
  addCar(startName: string, destinationName: string, options: AddCarOptions = {}): Car {
    const start = this.getVertex(startName);
    const destination = this.getVertex(destinationName);

    const car = new Car(`car-${this.nextCarNumber}`, start, destination, this);
    car.reroute();
    if (car.status === "stranded" && options.requireRoute) {
      car.detachAll();
      throw new UnreachableError(startName, destinationName);
    }

    this.nextCarNumber++;
    this.cars.set(car.id, car);
    this.announceStatus(car);
    this.settle();
    return car;
  }

  findCar(id: string): Car | undefined {
    return this.cars.get(id);
  }

  getCar(id: string): Car {
    const car = this.cars.get(id);
    if (!car) throw new UnknownCarError(id);
    return car;
  }

  listCars(): Car[] {
    return [...this.cars.values()];
  }

  removeCar(car: Car): void {
    this.assertLiveCar(car);
    car.detachAll();
    this.cars.delete(car.id);
    this.settle();
  }

  /**
   * Put a car onto its current edge. From then on rerouting keeps that edge.
   * @throws NotTravelingError when the car has no path
   */
  departCar(car: Car): Edge {
    this.assertLiveCar(car);
    const edge = car.depart();
    this.settle();
    return edge;
  }

  /**
   * Move a car across its current edge to the edge's end vertex.
   * @throws NotTravelingError when the car has no path
   */
  crossEdge(car: Car): Edge {
    this.assertLiveCar(car);
    const edge = car.crossEdge();
    if (car.status === "arrived") this.emit("car-arrived", { car });
    this.settle();
    return edge;
  }

  /** Recompute a car's path from where it is (e.g. to retry a stranded car) */
  rerouteCar(car: Car): Car {
    this.assertLiveCar(car);
    this.reroute(car);
    this.settle();
    return car;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private reroute(car: Car, cause?: Edge): void {
    const { previousPath, path } = car.reroute();
    this.emit("car-rerouted", { car, previousPath, path, cause });
    this.announceStatus(car);
  }

  private announceStatus(car: Car): void {
    if (car.status === "stranded") {
      console.warn(`[town] ${car.id} stranded: no path from ${car.endpoint.name} to ${car.destination.name}`);
      this.emit("car-stranded", { car });
    } else if (car.status === "arrived") {
      this.emit("car-arrived", { car });
    }
  }

  /**
   * Unlink a set of edges (and optionally a vertex), settling every car that
   * depended on them first.
   */
  private dropEdges(
    doomed: ReadonlySet<Edge>,
    removedVertex?: Vertex,
  ): { reroutedCars: Car[]; evictedCars: Car[] } {
    const evictedCars: Car[] = [];
    const reroutedCars: Car[] = [];

    for (const car of this.cars.values()) {
      const position = car.position;
      if (
        removedVertex &&
        (car.destination === removedVertex ||
          (position.kind === "at-vertex" && position.vertex === removedVertex) ||
          (position.kind === "on-edge" && position.edge.end === removedVertex))
      ) {
        evictedCars.push(car);
      } else if (position.kind === "on-edge" && doomed.has(position.edge)) {
        car.crossEdge();
        reroutedCars.push(car);
      } else if (car.path.some((edge) => doomed.has(edge))) {
        reroutedCars.push(car);
      }
    }

    for (const edge of doomed) {
      const outgoing = edge.start.outgoing;
      const index = outgoing.indexOf(edge);
      if (index >= 0) outgoing.splice(index, 1);
    }

    if (removedVertex) {
      this.vertices.delete(removedVertex.name);
      for (const car of evictedCars) {
        car.detachAll();
        this.cars.delete(car.id);
        console.warn(`[town] Evicted ${car.id}: vertex ${removedVertex.name} removed`);
        this.emit("car-evicted", { car, vertex: removedVertex });
      }
    }
    for (const car of reroutedCars) {
      this.reroute(car);
    }

    this.settle();
    return { reroutedCars, evictedCars };
  }

  private assertLiveEdge(edge: Edge): void {
    if (this.vertices.get(edge.start.name) !== edge.start || !edge.start.outgoing.includes(edge)) {
      throw new UnknownEdgeError(edge.id);
    }
  }

  private assertLiveCar(car: Car): void {
    if (this.cars.get(car.id) !== car) throw new UnknownCarError(car.id);
  }

  private emit<K extends TownEventName>(event: K, payload: TownEventMap[K]): void {
    this.pending.push(() => this.emitter.emit(event, payload));
  }

  /**
   * End of a mutation: check the bookkeeping when asked to, then deliver the
   * queued events in order. Listener errors are collected and rethrown once
   * every event has gone out.
   */
  private settle(): void {
    const deliveries = this.pending;
    this.pending = [];

    if (this.verifyInvariants) {
      const violations = checkTownInvariants(this);
      if (violations.length > 0) throw new InvariantViolationError(violations);
    }

    const errors: unknown[] = [];
    for (const deliver of deliveries) {
      try {
        deliver();
      } catch (err) {
        errors.push(err);
      }
    }
    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) throw new AggregateError(errors, `${errors.length} town event listeners failed`);
  }
}
