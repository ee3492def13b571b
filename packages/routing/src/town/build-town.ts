/**
 * Town construction from an adjacency description and a coordinate map.
 *
 * Vertices are created first, in adjacency order (which fixes their
 * tie-break rank), then roads in the order they are listed.
 */

import type {
  AdjacencyDescription,
  CoordinateDescription,
  RoadDescription,
} from "@town-sim/types";

import { DuplicateNameError, UnknownVertexError } from "../domain/errors.js";
import { Town, type TownOptions } from "./town.js";

export interface BuildTownOptions extends TownOptions {
  /** Mirror each road with an equal-weight road back, created right after it */
  twoWay?: boolean;
}

type AdjacencyEntry = readonly [name: string, roads: readonly RoadDescription[]];

function isEntryList(
  adjacency: AdjacencyDescription,
): adjacency is ReadonlyArray<AdjacencyEntry> {
  return Array.isArray(adjacency);
}

function isMap<V>(
  value: ReadonlyMap<string, V> | Readonly<Record<string, V>>,
): value is ReadonlyMap<string, V> {
  return value instanceof Map;
}

function adjacencyEntries(adjacency: AdjacencyDescription): AdjacencyEntry[] {
  if (isEntryList(adjacency)) return [...adjacency];
  if (isMap(adjacency)) return [...adjacency.entries()];
  return Object.entries(adjacency);
}

function coordinateEntries(
  coordinates: CoordinateDescription,
): [string, readonly [number, number]][] {
  if (isMap(coordinates)) return [...coordinates.entries()];
  return Object.entries(coordinates);
}

/**
 * Build a town.
 *
 * @throws InvalidNameError when a name is empty or contains "->"
 * @throws DuplicateNameError when the adjacency lists a name twice
 * @throws UnknownVertexError when a road or coordinate names a vertex that
 *   has no adjacency entry
 */
export function buildTown(
  adjacency: AdjacencyDescription,
  coordinates: CoordinateDescription,
  options: BuildTownOptions = {},
): Town {
  const town = new Town({ verifyInvariants: options.verifyInvariants });
  const entries = adjacencyEntries(adjacency);
  const positions = new Map(coordinateEntries(coordinates));

  const seen = new Set<string>();
  for (const [name] of entries) {
    if (seen.has(name)) throw new DuplicateNameError(name);
    seen.add(name);
  }
  for (const name of positions.keys()) {
    if (!seen.has(name)) throw new UnknownVertexError(name);
  }

  for (const [name] of entries) {
    const [x, y] = positions.get(name) ?? [0, 0];
    town.addVertex(name, { x, y });
  }

  for (const [from, roads] of entries) {
    for (const [to, weight] of roads) {
      town.connectVertices(from, to, weight);
      if (options.twoWay) town.connectVertices(to, from, weight);
    }
  }

  return town;
}
