import { Controller } from "@tsoa/runtime";
import type { CarView } from "@town-sim/types";
import type { AddCarRequest } from "../models/requests.js";
import type { SimulationService } from "../services/simulation.service.js";

export class CarController extends Controller {
  constructor(private readonly service: SimulationService) {
    super();
  }

  public async listCars(): Promise<CarView[]> {
    return this.service.simulation.listCars();
  }

  /** Add a car and plan its route; it may come back stranded */
  public async addCar(body: AddCarRequest): Promise<CarView> {
    const car = this.service.simulation.addCar(body.origin, body.destination, {
      requireRoute: body.requireRoute,
    });
    this.setStatus(201);
    return car;
  }

  public async getCar(id: string): Promise<CarView> {
    return this.service.simulation.getCar(id);
  }

  public async removeCar(id: string): Promise<void> {
    this.service.simulation.removeCar(id);
    this.setStatus(204);
  }

  /** Start along the current road */
  public async departCar(id: string): Promise<CarView> {
    return this.service.simulation.departCar(id);
  }

  /** Cross the current road */
  public async advanceCar(id: string): Promise<CarView> {
    return this.service.simulation.advanceCar(id);
  }

  public async rerouteCar(id: string): Promise<CarView> {
    return this.service.simulation.rerouteCar(id);
  }
}
