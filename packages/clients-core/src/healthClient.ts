import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { HealthResponse } from "./types.js";

export class HealthClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("health", config);
  }

  /** Server status plus stored node, failed-connection and gateway counts */
  public async getHealth(): Promise<HealthResponse> {
    return this.client.get<HealthResponse>();
  }

  /** Whether `POST /api/plan` can run; plans answer 409 until a gateway is placed */
  public async canPlan(): Promise<boolean> {
    const { network } = await this.getHealth();
    return network.hasGateway;
  }
}
