/**
 * Town descriptions - the input shapes a town is built from.
 *
 * A town is a directed graph of named locations connected by weighted roads.
 * Positions are carried for rendering only; routing never reads them.
 */

/** Planar position of a location (opaque to routing) */
export interface Position {
  x: number;
  y: number;
}

/** A road out of a location: `[neighbor name, weight]` */
export type RoadDescription = readonly [neighbor: string, weight: number];

/**
 * Adjacency description: location name -> outgoing roads.
 *
 * The entry-array form keeps declaration order explicit and is the only one
 * that can express (and therefore reject) a duplicated name.
 */
export type AdjacencyDescription =
  | ReadonlyMap<string, readonly RoadDescription[]>
  | Readonly<Record<string, readonly RoadDescription[]>>
  | ReadonlyArray<readonly [name: string, roads: readonly RoadDescription[]]>;

/** Coordinate description: location name -> `[x, y]` */
export type CoordinateDescription =
  | ReadonlyMap<string, readonly [x: number, y: number]>
  | Readonly<Record<string, readonly [x: number, y: number]>>;

/** A town description as stored in `configs/towns/<name>.json` */
export interface TownDescription {
  name: string;
  description: string;
  /** Mirror every declared road with an equal-weight road back */
  twoWay?: boolean;
  adjacency: Record<string, [string, number][]>;
  coordinates: Record<string, [number, number]>;
}
