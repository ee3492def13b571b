import { describe, it, expect } from "vitest";
import { checkTownInvariants } from "./invariants.js";
import { buildTown } from "./build-town.js";
import { Town } from "./town.js";
import { InvariantViolationError } from "../domain/errors.js";
import { createRandom } from "../simulation/random.js";

function makeFiveCorners(verifyInvariants = false): Town {
  return buildTown(
    {
      A: [["B", 4], ["C", 8], ["E", 2]],
      B: [["C", 3]],
      C: [["D", 5]],
      D: [["E", 2]],
      E: [],
    },
    {},
    { twoWay: true, verifyInvariants },
  );
}

/** Deterministic pseudo-random integers in [0, n) */
function makeRandom(seed: number): (n: number) => number {
  const next = createRandom(seed);
  return (n) => Math.floor(next() * n);
}

describe("checkTownInvariants", () => {
  it("finds nothing wrong in a fresh town with cars", () => {
    const town = makeFiveCorners();
    town.addCar("A", "C");
    town.departCar(town.addCar("D", "B"));
    expect(checkTownInvariants(town)).toEqual([]);
  });

  it("reports a car assigned to an edge it has not reached", () => {
    const town = makeFiveCorners();
    const car = town.addCar("A", "C");
    town.getEdge("B", "C").attach(car);
    expect(checkTownInvariants(town)).toEqual([
      "car-1 is assigned to B->C before reaching it",
      "B->C holds car-1, whose current edge is A->B",
    ]);
  });

  it("reports an edge holding a car that left the town", () => {
    const town = makeFiveCorners();
    const car = town.addCar("A", "C");
    town.removeCar(car);
    town.getEdge("A", "B").attach(car);
    expect(checkTownInvariants(town)).toEqual(["A->B holds car-1, which is not in the town"]);
  });

  it("reports a car missing from its current edge", () => {
    const town = makeFiveCorners();
    const car = town.addCar("A", "C");
    town.getEdge("A", "B").detach(car);
    expect(checkTownInvariants(town)).toEqual(["car-1 is missing from the car set of its current edge A->B"]);
  });

  it("makes a verifying town refuse to continue from corrupted state", () => {
    const town = makeFiveCorners(true);
    const car = town.addCar("A", "C");
    town.getEdge("B", "C").attach(car);
    expect(() => town.addCar("D", "E")).toThrow(InvariantViolationError);
  });

  it("holds through a long random sequence of mutations", () => {
    const town = makeFiveCorners(true);
    const random = makeRandom(7);
    const pick = <T>(items: readonly T[]): T | undefined => items[random(items.length)];
    const weights = [0, 1, 2, 5, 9, Infinity];

    for (let step = 0; step < 500; step++) {
      const vertices = town.listVertices();
      const edges = town.listEdges();
      const cars = town.listCars();

      switch (random(9)) {
        case 0: {
          const from = pick(vertices);
          const to = pick(vertices);
          if (from && to) town.addCar(from.name, to.name);
          break;
        }
        case 1: {
          const edge = pick(edges);
          const weight = pick(weights);
          if (edge && weight !== undefined) town.updateWeight(edge, weight);
          break;
        }
        case 2:
        case 3: {
          const car = pick(cars);
          if (car?.currentEdge) {
            if (car.position.kind === "at-vertex") town.departCar(car);
            else town.crossEdge(car);
          }
          break;
        }
        case 4: {
          const car = pick(cars);
          if (car) town.removeCar(car);
          break;
        }
        case 5: {
          const edge = pick(edges);
          if (edge) town.disconnectVertices(edge.start.name, edge.end.name);
          break;
        }
        case 6: {
          const from = pick(vertices);
          const to = pick(vertices);
          const weight = pick(weights);
          if (from && to && from !== to && !from.edgeTo(to) && weight !== undefined) {
            town.connectVertices(from.name, to.name, weight);
          }
          break;
        }
        case 7: {
          const car = pick(cars);
          if (car) town.rerouteCar(car);
          break;
        }
        case 8: {
          if (vertices.length > 3 && random(4) === 0) {
            const vertex = pick(vertices);
            if (vertex) town.removeVertex(vertex.name);
          } else if (!town.findVertex(`V${step}`)) {
            town.addVertex(`V${step}`);
          }
          break;
        }
      }

      expect(checkTownInvariants(town)).toEqual([]);
    }
  });
});
