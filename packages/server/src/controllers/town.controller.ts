import { Controller } from "@tsoa/runtime";
import type { EdgeView, VertexView } from "@town-sim/types";
import {
  weightFromJson,
  type AddVertexRequest,
  type ConnectRequest,
  type UpdateEdgeRequest,
} from "../models/requests.js";
import type {
  EdgeRemovalResponse,
  EdgeUpdateResponse,
  TownConfigListItem,
  TownResponse,
  VertexRemovalResponse,
} from "../models/responses.js";
import type { SimulationService } from "../services/simulation.service.js";

export class TownController extends Controller {
  constructor(private readonly service: SimulationService) {
    super();
  }

  /** The whole town: vertices, edges and cars */
  public async getTown(): Promise<TownResponse> {
    return this.service.getTown();
  }

  /** Town configs available to load */
  public async listTownConfigs(): Promise<TownConfigListItem[]> {
    return this.service.listTownConfigs();
  }

  public async listVertices(): Promise<VertexView[]> {
    return this.service.simulation.listVertices();
  }

  public async addVertex(body: AddVertexRequest): Promise<VertexView> {
    const vertex = this.service.simulation.addVertex(body.name, body.position);
    this.setStatus(201);
    return vertex;
  }

  /** Remove a vertex with its roads; cars bound for it are evicted */
  public async removeVertex(name: string): Promise<VertexRemovalResponse> {
    return this.service.simulation.removeVertex(name);
  }

  public async listEdges(): Promise<EdgeView[]> {
    return this.service.simulation.listEdges();
  }

  public async connect(body: ConnectRequest): Promise<EdgeView> {
    const edge = this.service.simulation.connect(body.from, body.to, weightFromJson(body.weight));
    this.setStatus(201);
    return edge;
  }

  /** Change a road's weight; `null` closes it */
  public async updateEdge(from: string, to: string, body: UpdateEdgeRequest): Promise<EdgeUpdateResponse> {
    return this.service.simulation.setEdgeWeight({ from, to }, weightFromJson(body.weight));
  }

  public async disconnect(from: string, to: string): Promise<EdgeRemovalResponse> {
    return this.service.simulation.disconnect({ from, to });
  }
}
