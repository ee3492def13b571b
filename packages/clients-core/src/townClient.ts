import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  AddVertexRequest,
  ConnectRequest,
  EdgeRemovalResponse,
  EdgeUpdateResponse,
  EdgeView,
  TownConfigListItem,
  TownResponse,
  VertexRemovalResponse,
  VertexView,
} from "./types.js";

export class TownClient {
  private client: BaseClient;
  private configs: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/town", config);
    this.configs = new BaseClient("api/towns", config);
  }

  /** The whole town: vertices, edges and cars */
  public async getTown(): Promise<TownResponse> {
    return this.client.get<TownResponse>();
  }

  /** Town configs the server can load */
  public async listTownConfigs(): Promise<TownConfigListItem[]> {
    return this.configs.get<TownConfigListItem[]>();
  }

  public async listVertices(): Promise<VertexView[]> {
    return this.client.get<VertexView[]>({ path: "vertices" });
  }

  public async addVertex(request: AddVertexRequest): Promise<VertexView> {
    return this.client.post<VertexView>({ path: "vertices", body: request });
  }

  public async removeVertex(name: string): Promise<VertexRemovalResponse> {
    return this.client.delete<VertexRemovalResponse>({
      path: `vertices/${encodeURIComponent(name)}`,
    });
  }

  public async listEdges(): Promise<EdgeView[]> {
    return this.client.get<EdgeView[]>({ path: "edges" });
  }

  public async connect(request: ConnectRequest): Promise<EdgeView> {
    return this.client.post<EdgeView>({ path: "edges", body: request });
  }

  /** Change a road's weight; `null` closes it */
  public async updateEdge(from: string, to: string, weight: number | null): Promise<EdgeUpdateResponse> {
    return this.client.put<EdgeUpdateResponse>({
      path: edgePath(from, to),
      body: { weight },
    });
  }

  public async disconnect(from: string, to: string): Promise<EdgeRemovalResponse> {
    return this.client.delete<EdgeRemovalResponse>({ path: edgePath(from, to) });
  }
}

function edgePath(from: string, to: string): string {
  return `edges/${encodeURIComponent(from)}/${encodeURIComponent(to)}`;
}
