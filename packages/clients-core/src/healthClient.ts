import axios from "axios";
import { ApiError, BaseClient, type ClientConfig } from "./baseClient.js";
import type { HealthResponse, TownStats } from "./types.js";

export class HealthClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("health", config);
  }

  /** Uptime and town statistics */
  public async getHealth(): Promise<HealthResponse> {
    return this.client.get<HealthResponse>();
  }

  /** Vertex, edge and car counts of the running town */
  public async getTownStats(): Promise<TownStats> {
    const { town } = await this.getHealth();
    return town;
  }

  /**
   * Whether the server answers its health check. An error status or a
   * request that never got a response counts as down; anything else is
   * rethrown.
   */
  public async isUp(): Promise<boolean> {
    try {
      const health = await this.getHealth();
      return health.status === "ok";
    } catch (err) {
      if (err instanceof ApiError || axios.isAxiosError(err)) return false;
      throw err;
    }
  }
}
