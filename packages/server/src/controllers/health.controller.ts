import { Controller } from "@tsoa/runtime";
import type { HealthResponse } from "../models/responses.js";
import type { SimulationService } from "../services/simulation.service.js";

export class HealthController extends Controller {
  constructor(private readonly service: SimulationService) {
    super();
  }

  /** Health check with town statistics */
  public async getHealth(): Promise<HealthResponse> {
    return {
      status: "ok",
      uptime: process.uptime(),
      town: this.service.getStats(),
    };
  }
}
