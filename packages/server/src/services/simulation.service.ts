/**
 * Simulation service - owns the one town the server drives.
 *
 * The town is loaded from a config under configs/towns/ at startup; every
 * request then works against the same in-memory simulation.
 */

import type { TownDescription } from "@town-sim/types";
import { Simulation, listTownConfigs, loadTownDescription } from "@town-sim/routing";
import type { ServerConfig } from "../config.js";
import type { TownConfigListItem, TownResponse, TownStats } from "../models/responses.js";

export type SimulationSettings = Pick<ServerConfig, "town" | "verifyInvariants" | "eventLogSize">;

export class SimulationService {
  constructor(
    readonly simulation: Simulation,
    private readonly description: Pick<TownDescription, "name" | "description">,
  ) {}

  /** Load the configured town and wrap it in a simulation */
  static load(settings: SimulationSettings, configsRoot?: string): SimulationService {
    const description = loadTownDescription(settings.town, configsRoot);
    const simulation = Simulation.fromDescription(description, {
      verifyInvariants: settings.verifyInvariants,
      eventLogSize: settings.eventLogSize,
    });
    return new SimulationService(simulation, description);
  }

  get townName(): string {
    return this.description.name;
  }

  getTown(): TownResponse {
    return {
      name: this.description.name,
      description: this.description.description,
      ...this.simulation.snapshot(),
    };
  }

  getStats(): TownStats {
    const { town } = this.simulation;
    return {
      name: this.description.name,
      vertices: town.listVertices().length,
      edges: town.listEdges().length,
      cars: town.listCars().length,
    };
  }

  listTownConfigs(configsRoot?: string): TownConfigListItem[] {
    return listTownConfigs(configsRoot);
  }
}
