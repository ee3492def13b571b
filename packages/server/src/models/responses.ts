import type {
  CarView,
  EdgeView,
  TownEventView,
  TownSnapshot,
} from "@town-sim/types";

export interface TownStats {
  name: string;
  vertices: number;
  edges: number;
  cars: number;
}

export interface HealthResponse {
  status: "ok";
  uptime: number;
  town: TownStats;
}

export interface TownResponse extends TownSnapshot {
  name: string;
  description: string;
}

export interface TownConfigListItem {
  name: string;
  description: string;
  vertexCount: number;
}

export interface VertexRemovalResponse {
  vertex: string;
  removedEdges: string[];
  rerouted: CarView[];
  evicted: string[];
}

export interface EdgeUpdateResponse {
  edge: EdgeView;
  rerouted: CarView[];
}

export interface EdgeRemovalResponse {
  edge: string;
  rerouted: CarView[];
}

export interface EventListResponse {
  events: TownEventView[];
}

export interface ErrorResponse {
  message: string;
  kind?: string;
  details?: unknown;
}
