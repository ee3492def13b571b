export { createApp } from "./app.js";
export { loadServerConfig, type ServerConfig } from "./config.js";
export { SimulationService, type SimulationSettings } from "./services/simulation.service.js";
export type {
  EdgeRemovalResponse,
  EdgeUpdateResponse,
  ErrorResponse,
  EventListResponse,
  HealthResponse,
  TownConfigListItem,
  TownResponse,
  TownStats,
  VertexRemovalResponse,
} from "./models/responses.js";
