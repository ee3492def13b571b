import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { TickRequest, TickResult } from "./types.js";

export class TickClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/ticks", config);
  }

  /** Apply weight changes as one batch, then advance the listed cars */
  public async applyTick(request: TickRequest): Promise<TickResult> {
    return this.client.post<TickResult>({ body: request });
  }
}
