// Base
export {
  ApiError,
  BaseClient,
  toApiError,
  type ClientConfig,
  type RequestParams,
} from "./baseClient.js";

// Domain clients
export { TownClient } from "./townClient.js";
export { CarClient } from "./carClient.js";
export { TickClient } from "./tickClient.js";
export { EventClient } from "./eventClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Views
  Position,
  VertexView,
  EdgeView,
  CarStatus,
  CarPositionView,
  CarView,
  TownEventView,
  // Health
  TownStats,
  HealthResponse,
  // Town
  TownResponse,
  TownConfigListItem,
  AddVertexRequest,
  VertexRemovalResponse,
  ConnectRequest,
  EdgeUpdateResponse,
  EdgeRemovalResponse,
  // Cars
  AddCarRequest,
  // Ticks
  WeightChange,
  TickRequest,
  TickResult,
  // Events
  EventListResponse,
  // Errors
  ErrorResponse,
} from "./types.js";
