import { Controller } from "@tsoa/runtime";
import type { EventListResponse } from "../models/responses.js";
import type { SimulationService } from "../services/simulation.service.js";

export class EventController extends Controller {
  constructor(private readonly service: SimulationService) {
    super();
  }

  /** Most recent town events, oldest first */
  public async listEvents(limit?: number): Promise<EventListResponse> {
    return { events: this.service.simulation.recentEvents(limit) };
  }
}
