import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { EventListResponse } from "./types.js";

export class EventClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/events", config);
  }

  /** Most recent town events, oldest first */
  public async listEvents(limit?: number): Promise<EventListResponse> {
    return this.client.get<EventListResponse>(limit === undefined ? {} : { query: { limit } });
  }
}
