/**
 * Conversion of live town objects into JSON-safe views.
 */

import type {
  CarPositionView,
  CarView,
  EdgeView,
  VertexView,
} from "@town-sim/types";

import type { Car } from "../domain/car.js";
import type { Edge } from "../domain/edge.js";
import type { Vertex } from "../domain/vertex.js";

/** JSON has no Infinity: closed weights become null */
export function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

export function toVertexView(vertex: Vertex): VertexView {
  return {
    name: vertex.name,
    position: { ...vertex.position },
    roads: vertex.outgoing.map((edge) => edge.id),
  };
}

export function toEdgeView(edge: Edge): EdgeView {
  return {
    id: edge.id,
    from: edge.start.name,
    to: edge.end.name,
    weight: finiteOrNull(edge.weight),
    closed: edge.closed,
    cars: edge.cars.map((car) => car.id),
  };
}

export function toCarView(car: Car): CarView {
  const position: CarPositionView =
    car.position.kind === "on-edge"
      ? { kind: "on-edge", edge: car.position.edge.id }
      : { kind: "at-vertex", vertex: car.position.vertex.name };
  return {
    id: car.id,
    origin: car.origin.name,
    destination: car.destination.name,
    status: car.status,
    position,
    path: car.path.map((edge) => edge.id),
    remainingCost: finiteOrNull(car.remainingCost),
  };
}
