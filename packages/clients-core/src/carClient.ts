import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { AddCarRequest, CarView } from "./types.js";

export class CarClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/cars", config);
  }

  public async listCars(): Promise<CarView[]> {
    return this.client.get<CarView[]>();
  }

  /** Add a car; it comes back stranded when no route exists, unless requireRoute is set */
  public async addCar(request: AddCarRequest): Promise<CarView> {
    return this.client.post<CarView>({ body: request });
  }

  public async getCar(id: string): Promise<CarView> {
    return this.client.get<CarView>({ path: encodeURIComponent(id) });
  }

  public async removeCar(id: string): Promise<void> {
    await this.client.delete<unknown>({ path: encodeURIComponent(id) });
  }

  public async departCar(id: string): Promise<CarView> {
    return this.client.post<CarView>({ path: `${encodeURIComponent(id)}/depart` });
  }

  public async advanceCar(id: string): Promise<CarView> {
    return this.client.post<CarView>({ path: `${encodeURIComponent(id)}/advance` });
  }

  public async rerouteCar(id: string): Promise<CarView> {
    return this.client.post<CarView>({ path: `${encodeURIComponent(id)}/reroute` });
  }
}
