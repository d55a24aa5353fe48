import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { PlanGeoJson, PlanGeoJsonRequest, PlanRequest, PlanResponse } from "./types.js";

export class PlanClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/plan", config);
  }

  /** Plan the stored network */
  public async plan(request: PlanRequest = {}): Promise<PlanResponse> {
    return this.client.post<PlanResponse>({ body: request });
  }

  /** Plan the stored network as a GeoJSON FeatureCollection */
  public async planGeoJson(request: PlanGeoJsonRequest = {}): Promise<PlanGeoJson> {
    return this.client.post<PlanGeoJson>({ path: "geojson", body: request });
  }
}
