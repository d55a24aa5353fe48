import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  Coordinate,
  Gateway,
  NetworkSnapshot,
  RelayNode,
  UpsertNodeRequest,
} from "./types.js";

export class NetworkClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/network", config);
  }

  /** Gateway, nodes and failed connections as stored */
  public async getNetwork(): Promise<NetworkSnapshot> {
    return this.client.get<NetworkSnapshot>();
  }

  public async setGateway(coordinate: Coordinate): Promise<Gateway> {
    return this.client.put<Gateway>({ path: "gateway", body: { coordinate } });
  }

  /** Add or move a node; omit `gatewayEligible` to let the server derive it */
  public async upsertNode(id: string, request: UpsertNodeRequest): Promise<RelayNode> {
    return this.client.put<RelayNode>({ path: ["nodes", id], body: request });
  }

  public async removeNode(id: string): Promise<void> {
    await this.client.delete<unknown>({ path: ["nodes", id] });
  }
}
