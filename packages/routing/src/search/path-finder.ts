/**
 * Shortest paths over a town with Dijkstra.
 *
 * The finder holds no state: each call reads the edge weights as they are
 * now, so a weight update is visible to the very next search. Costs are
 * abstract and non-negative; closed roads (infinite weight) are never taken.
 */

import { Edge } from "../domain/edge.js";
import type { Vertex } from "../domain/vertex.js";
import { PriorityQueue } from "./priority-queue.js";

/**
 * Minimum-cost path between two vertices, or [] when unreachable (or when
 * source is destination).
 *
 * Equal costs resolve deterministically: the queue breaks ties by vertex
 * rank, and a vertex keeps the first predecessor that reached it at its
 * final cost, scanning outgoing edges in declaration order.
 */
export function shortestPath(source: Vertex, destination: Vertex): Edge[] {
  if (source === destination) return [];

  const distance = new Map<Vertex, number>([[source, 0]]);
  const reachedBy = new Map<Vertex, Edge>();
  const settled = new Set<Vertex>();
  const queue = new PriorityQueue<Vertex>();
  queue.push(source, 0, source.rank);

  for (let entry = queue.pop(); entry; entry = queue.pop()) {
    const { item: vertex, priority: cost } = entry;
    if (settled.has(vertex)) continue;
    settled.add(vertex);

    // Stop on pop, not on discovery: only a popped cost is final
    if (vertex === destination) return walkBack(reachedBy, source, destination);

    for (const edge of vertex.outgoing) {
      if (edge.closed || settled.has(edge.end)) continue;
      const candidate = cost + edge.weight;
      const known = distance.get(edge.end);
      if (known === undefined || candidate < known) {
        distance.set(edge.end, candidate);
        reachedBy.set(edge.end, edge);
        queue.push(edge.end, candidate, edge.end.rank);
      }
    }
  }

  return [];
}

function walkBack(reachedBy: Map<Vertex, Edge>, source: Vertex, destination: Vertex): Edge[] {
  const path: Edge[] = [];
  let vertex = destination;
  while (vertex !== source) {
    const edge = reachedBy.get(vertex);
    if (!edge) return [];
    path.push(edge);
    vertex = edge.start;
  }
  return path.reverse();
}

/**
 * Path from a car's position to `destination`.
 *
 * From a vertex this is {@link shortestPath}. From an edge being traversed
 * the edge always comes first, whatever is cheapest onward: the search
 * starts at its end vertex and the result is `[edge, ...continuation]`,
 * or just `[edge]` when the continuation is unreachable.
 */
export function findPath(origin: Vertex | Edge, destination: Vertex): Edge[] {
  if (origin instanceof Edge) {
    return [origin, ...shortestPath(origin.end, destination)];
  }
  return shortestPath(origin, destination);
}

/** Total weight of a path */
export function pathCost(path: readonly Edge[]): number {
  return path.reduce((sum, edge) => sum + edge.weight, 0);
}
