import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { TownDescription } from "@town-sim/types";
import { Simulation } from "./simulation.js";
import { InvalidNameError, UnknownCarError, UnknownEdgeError, UnreachableError } from "../domain/errors.js";

const FIVE_CORNERS: TownDescription = {
  name: "five-corners",
  description: "",
  twoWay: true,
  adjacency: {
    A: [["B", 4], ["C", 8], ["E", 2]],
    B: [["C", 3]],
    C: [["D", 5]],
    D: [["E", 2]],
    E: [],
  },
  coordinates: { A: [100, 100], B: [300, 60] },
};

function makeSimulation(eventLogSize?: number): Simulation {
  return Simulation.fromDescription(FIVE_CORNERS, { verifyInvariants: true, eventLogSize });
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Simulation queries", () => {
  it("describes vertices with their roads", () => {
    const sim = makeSimulation();
    expect(sim.listVertices()[0]).toEqual({
      name: "A",
      position: { x: 100, y: 100 },
      roads: ["A->B", "A->C", "A->E"],
    });
    expect(sim.snapshot().edges).toHaveLength(12);
  });

  it("looks edges up by id or by endpoints", () => {
    const sim = makeSimulation();
    const expected = { id: "B->C", from: "B", to: "C", weight: 3, closed: false, cars: [] };
    expect(sim.getEdge("B->C")).toEqual(expected);
    expect(sim.getEdge({ from: "B", to: "C" })).toEqual(expected);
  });

  it("rejects malformed and unknown references", () => {
    const sim = makeSimulation();
    expect(() => sim.getEdge("BC")).toThrow(UnknownEdgeError);
    expect(() => sim.getEdge("A->")).toThrow(UnknownEdgeError);
    expect(() => sim.getEdge("A->Z")).toThrow(UnknownEdgeError);
    expect(() => sim.getCar("car-9")).toThrow(UnknownCarError);
  });

  it("resolves an id whose names end and start with arrow halves", () => {
    const sim = makeSimulation();
    sim.addVertex("x-", { x: 0, y: 0 });
    sim.addVertex(">y", { x: 1, y: 0 });
    sim.connect("x-", ">y", 2);
    expect(sim.getEdge("x-->>y")).toEqual({ id: "x-->>y", from: "x-", to: ">y", weight: 2, closed: false, cars: [] });
    expect(() => sim.addVertex("A->B", { x: 0, y: 0 })).toThrow(InvalidNameError);
  });
});

describe("Simulation cars", () => {
  it("plans a new car along the cheapest route", () => {
    const sim = makeSimulation();
    expect(sim.addCar("A", "C")).toEqual({
      id: "car-1",
      origin: "A",
      destination: "C",
      status: "en-route",
      position: { kind: "at-vertex", vertex: "A" },
      path: ["A->B", "B->C"],
      remainingCost: 7,
    });
    expect(sim.getEdge("A->B").cars).toEqual(["car-1"]);
  });

  it("moves a car along its path", () => {
    const sim = makeSimulation();
    sim.addCar("A", "C");
    expect(sim.departCar("car-1").position).toEqual({ kind: "on-edge", edge: "A->B" });
    const moved = sim.advanceCar("car-1");
    expect(moved.position).toEqual({ kind: "at-vertex", vertex: "B" });
    expect(moved.path).toEqual(["B->C"]);
    expect(sim.getEdge("B->C").cars).toEqual(["car-1"]);
  });

  it("adds a stranded car unless a route is required", () => {
    const sim = makeSimulation();
    sim.addVertex("Island", { x: 5, y: 5 });
    const car = sim.addCar("A", "Island");
    expect(car.status).toBe("stranded");
    expect(car.path).toEqual([]);
    expect(() => sim.addCar("A", "Island", { requireRoute: true })).toThrow(UnreachableError);
    expect(sim.listCars().map((c) => c.id)).toEqual(["car-1"]);
    expect(sim.recentEvents()).toEqual([{ type: "car-stranded", car: "car-1" }]);
  });

  it("forgets removed cars", () => {
    const sim = makeSimulation();
    sim.addCar("A", "C");
    sim.removeCar("car-1");
    expect(sim.listCars()).toEqual([]);
    expect(sim.getEdge("A->B").cars).toEqual([]);
  });
});

describe("Simulation edge changes", () => {
  it("reroutes cars on a re-weighted edge and logs the events", () => {
    const sim = makeSimulation();
    sim.addCar("A", "C");
    const update = sim.setEdgeWeight("A->B", 10);

    expect(update.edge).toEqual({ id: "A->B", from: "A", to: "B", weight: 10, closed: false, cars: [] });
    expect(update.rerouted.map((car) => [car.id, car.path, car.remainingCost])).toEqual([["car-1", ["A->C"], 8]]);
    expect(sim.recentEvents()).toEqual([
      { type: "edge-weight-changed", edge: "A->B", previousWeight: 4, weight: 10 },
      { type: "car-rerouted", car: "car-1", previousPath: ["A->B", "B->C"], path: ["A->C"], cause: "A->B" },
    ]);
  });

  it("shows a closed road with a null weight", () => {
    const sim = makeSimulation();
    const update = sim.setEdgeWeight({ from: "B", to: "C" }, Infinity);
    expect(update.edge.weight).toBeNull();
    expect(update.edge.closed).toBe(true);
    expect(sim.recentEvents()).toEqual([{ type: "edge-weight-changed", edge: "B->C", previousWeight: 3, weight: null }]);
  });

  it("adds and removes roads", () => {
    const sim = makeSimulation();
    expect(sim.connect("B", "E", 1)).toEqual({ id: "B->E", from: "B", to: "E", weight: 1, closed: false, cars: [] });
    sim.addCar("A", "C");
    const removal = sim.disconnect("B->C");
    expect(removal.edge).toBe("B->C");
    expect(removal.rerouted.map((car) => car.path)).toEqual([["A->C"]]);
  });

  it("reports what removing a vertex did", () => {
    const sim = makeSimulation();
    sim.addCar("A", "C");
    sim.addCar("E", "B");
    expect(sim.removeVertex("B")).toEqual({
      vertex: "B",
      removedEdges: ["B->A", "B->C", "A->B", "C->B"],
      rerouted: [
        {
          id: "car-1",
          origin: "A",
          destination: "C",
          status: "en-route",
          position: { kind: "at-vertex", vertex: "A" },
          path: ["A->C"],
          remainingCost: 8,
        },
      ],
      evicted: ["car-2"],
    });
    expect(sim.listCars().map((car) => car.id)).toEqual(["car-1"]);
  });
});

describe("Simulation.applyTick", () => {
  it("applies weight changes before advancing cars", () => {
    const sim = makeSimulation();
    sim.addCar("A", "C");
    const result = sim.applyTick({ weightChanges: [{ edge: "A->B", weight: 10 }], advances: ["car-1"] });

    expect(result.edges.map((edge) => [edge.id, edge.weight])).toEqual([["A->B", 10]]);
    expect(result.rerouted.map((car) => car.id)).toEqual(["car-1"]);
    expect(result.advanced).toEqual([
      {
        id: "car-1",
        origin: "A",
        destination: "C",
        status: "arrived",
        position: { kind: "at-vertex", vertex: "C" },
        path: [],
        remainingCost: 0,
      },
    ]);
    expect(result.stalled).toEqual([]);
    expect(sim.recentEvents(1)).toEqual([{ type: "car-arrived", car: "car-1", vertex: "C" }]);
  });

  it("reports cars with no road left as stalled", () => {
    const sim = makeSimulation();
    sim.addCar("D", "D");
    expect(sim.applyTick({ advances: ["car-1"] })).toEqual({ edges: [], rerouted: [], advanced: [], stalled: ["car-1"] });
  });

  it("rejects a tick naming an unknown car before changing anything", () => {
    const sim = makeSimulation();
    expect(() => sim.applyTick({ weightChanges: [{ edge: "A->B", weight: 1 }], advances: ["car-9"] })).toThrow(
      UnknownCarError,
    );
    expect(sim.getEdge("A->B").weight).toBe(4);
  });

  it("lists each named edge once", () => {
    const sim = makeSimulation();
    const result = sim.applyTick({
      weightChanges: [
        { edge: "D->E", weight: 1 },
        { edge: "A->E", weight: 2 },
        { edge: "D->E", weight: 6 },
      ],
    });
    expect(result.edges.map((edge) => [edge.id, edge.weight])).toEqual([
      ["D->E", 6],
      ["A->E", 2],
    ]);
  });
});

describe("Simulation event log", () => {
  it("keeps only the most recent events", () => {
    const sim = makeSimulation(2);
    for (const weight of [5, 6, 7]) sim.setEdgeWeight("A->B", weight);
    expect(sim.recentEvents()).toEqual([
      { type: "edge-weight-changed", edge: "A->B", previousWeight: 5, weight: 6 },
      { type: "edge-weight-changed", edge: "A->B", previousWeight: 6, weight: 7 },
    ]);
    expect(sim.recentEvents(1)).toEqual([{ type: "edge-weight-changed", edge: "A->B", previousWeight: 6, weight: 7 }]);
    expect(sim.recentEvents(0)).toEqual([]);
  });
});
