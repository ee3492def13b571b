import { Controller } from "@tsoa/runtime";
import type { TickResult } from "@town-sim/types";
import type { TickRequestBody } from "../models/requests.js";
import type { SimulationService } from "../services/simulation.service.js";

export class TickController extends Controller {
  constructor(private readonly service: SimulationService) {
    super();
  }

  /** Apply a batch of weight changes, then advance the listed cars */
  public async applyTick(body: TickRequestBody): Promise<TickResult> {
    return this.service.simulation.applyTick(body);
  }
}
