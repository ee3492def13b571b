import type { Car } from "./car.js";
import type { Vertex } from "./vertex.js";

export const EDGE_ARROW = "->";

/**
 * Vertex names are non-empty and never contain the arrow, so the first arrow
 * in an edge id always ends the start vertex's name.
 */
export function isValidVertexName(name: string): boolean {
  return name.length > 0 && !name.includes(EDGE_ARROW);
}

/** Canonical edge id: `<from>-><to>` */
export function edgeId(from: string, to: string): string {
  return `${from}${EDGE_ARROW}${to}`;
}

/**
 * Parse an edge id back into its endpoint names.
 * Splits on the first arrow; returns null when there is none.
 */
export function parseEdgeId(id: string): { from: string; to: string } | null {
  const arrow = id.indexOf(EDGE_ARROW);
  const rest = arrow + EDGE_ARROW.length;
  if (arrow <= 0 || rest >= id.length) return null;
  return { from: id.slice(0, arrow), to: id.slice(rest) };
}

/**
 * A one-way road between two vertices.
 *
 * The car set holds the cars whose current road this is: cars waiting at the
 * start vertex to take it next, and cars part-way along it. Both the weight
 * and the car set are changed only through the owning town.
 */
export class Edge {
  private readonly assigned = new Set<Car>();

  constructor(
    readonly start: Vertex,
    readonly end: Vertex,
    private currentWeight: number,
  ) {}

  get id(): string {
    return edgeId(this.start.name, this.end.name);
  }

  get weight(): number {
    return this.currentWeight;
  }

  /** An infinite weight closes the road */
  get closed(): boolean {
    return this.currentWeight === Infinity;
  }

  /** Cars assigned to this edge, in assignment order */
  get cars(): readonly Car[] {
    return [...this.assigned];
  }

  hasCar(car: Car): boolean {
    return this.assigned.has(car);
  }

  /** @internal */
  setWeight(weight: number): void {
    this.currentWeight = weight;
  }

  /** @internal */
  attach(car: Car): void {
    this.assigned.add(car);
  }

  /** @internal */
  detach(car: Car): void {
    this.assigned.delete(car);
  }
}
