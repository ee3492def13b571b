/**
 * API request/response types for the town simulation server.
 *
 * Views of vertices, edges and cars come from @town-sim/types; the shapes
 * below mirror the server's request and response models.
 */

import type {
  CarView,
  EdgeView,
  Position,
  TownEventView,
  TownSnapshot,
} from "@town-sim/types";

export type {
  CarPositionView,
  CarStatus,
  CarView,
  EdgeView,
  Position,
  TickRequest,
  TickResult,
  TownEventView,
  VertexView,
  WeightChange,
} from "@town-sim/types";

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

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

// ---------------------------------------------------------------------------
// Town
// ---------------------------------------------------------------------------

export interface TownResponse extends TownSnapshot {
  name: string;
  description: string;
}

export interface TownConfigListItem {
  name: string;
  description: string;
  vertexCount: number;
}

export interface AddVertexRequest {
  name: string;
  position?: Position;
}

export interface VertexRemovalResponse {
  vertex: string;
  removedEdges: string[];
  rerouted: CarView[];
  evicted: string[];
}

export interface ConnectRequest {
  from: string;
  to: string;
  /** `null` adds the road closed */
  weight: number | null;
}

export interface EdgeUpdateResponse {
  edge: EdgeView;
  rerouted: CarView[];
}

export interface EdgeRemovalResponse {
  edge: string;
  rerouted: CarView[];
}

// ---------------------------------------------------------------------------
// Cars
// ---------------------------------------------------------------------------

export interface AddCarRequest {
  origin: string;
  destination: string;
  /** Fail with 409 instead of adding a stranded car */
  requireRoute?: boolean;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface EventListResponse {
  events: TownEventView[];
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  message: string;
  kind?: string;
  details?: unknown;
}
