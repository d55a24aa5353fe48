import { Controller } from "@tsoa/runtime";
import type { PlanGeoJsonCollection } from "@lora-planner/planner";
import { parsePlanGeoJsonRequest, parsePlanRequest } from "../models/requests.js";
import type { PlanResponse } from "../models/responses.js";
import type { PlanningService } from "../services/planning.service.js";

export class PlanController extends Controller {
  constructor(private readonly service: PlanningService) {
    super();
  }

  /** Plan the stored network and emit device configuration commands */
  public async plan(body: unknown): Promise<PlanResponse> {
    return this.service.plan(parsePlanRequest(body));
  }

  /** Plan the stored network and export it as GeoJSON */
  public async planGeoJson(body: unknown): Promise<PlanGeoJsonCollection> {
    const { includeUnreachable, includeFeasibleLinks, ...options } =
      parsePlanGeoJsonRequest(body);
    return this.service.planGeoJson(options, { includeUnreachable, includeFeasibleLinks });
  }
}
