import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { ConnectionPair } from "./types.js";

export class OverrideClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/overrides", config);
  }

  public async listOverrides(): Promise<ConnectionPair[]> {
    return this.client.get<ConnectionPair[]>();
  }

  /** Mark a connection as failed; the server answers with the canonical pair */
  public async addOverride(a: string, b: string): Promise<ConnectionPair> {
    return this.client.post<ConnectionPair>({ body: { a, b } });
  }

  public async removeOverride(a: string, b: string): Promise<void> {
    await this.client.delete<unknown>({ path: [a, b] });
  }
}
