/**
 * Consistency checks for car/edge bookkeeping.
 *
 * Each car is assigned to its current edge (first edge of its path) and to
 * no other; each edge's car set holds exactly the live cars whose current
 * edge it is. Paths are contiguous, start where the car is, and use only
 * edges still in the town.
 */

import type { Edge } from "../domain/edge.js";
import type { Town } from "./town.js";

/** List every bookkeeping violation in the town (empty when consistent) */
export function checkTownInvariants(town: Town): string[] {
  const violations: string[] = [];
  const liveEdges = new Set<Edge>(town.listEdges());
  const cars = town.listCars();
  const liveCars = new Set(cars);

  for (const car of cars) {
    const { path, position } = car;
    const first = path[0];

    if (position.kind === "on-edge") {
      if (first !== position.edge) {
        violations.push(`${car.id} is on ${position.edge.id} but its path starts with ${first?.id ?? "nothing"}`);
      }
    } else if (first && first.start !== position.vertex) {
      violations.push(`${car.id} is at ${position.vertex.name} but its path starts with ${first.id}`);
    }

    path.forEach((edge, index) => {
      if (!liveEdges.has(edge)) {
        violations.push(`${car.id} plans removed edge ${edge.id}`);
      }
      const next = path[index + 1];
      if (next && next.start !== edge.end) {
        violations.push(`${car.id} path breaks between ${edge.id} and ${next.id}`);
      }
      if (index === 0 && !edge.hasCar(car)) {
        violations.push(`${car.id} is missing from the car set of its current edge ${edge.id}`);
      }
      if (index > 0 && edge !== first && edge.hasCar(car)) {
        violations.push(`${car.id} is assigned to ${edge.id} before reaching it`);
      }
    });
  }

  for (const edge of liveEdges) {
    for (const car of edge.cars) {
      if (!liveCars.has(car)) {
        violations.push(`${edge.id} holds ${car.id}, which is not in the town`);
      } else if (car.currentEdge !== edge) {
        violations.push(`${edge.id} holds ${car.id}, whose current edge is ${car.currentEdge?.id ?? "none"}`);
      }
    }
  }

  return violations;
}
