import { Controller } from "@tsoa/runtime";
import type { HealthResponse } from "../models/responses.js";
import type { PlanningService } from "../services/planning.service.js";

export class HealthController extends Controller {
  constructor(private readonly service: PlanningService) {
    super();
  }

  /** Health check with network statistics */
  public async getHealth(): Promise<HealthResponse> {
    return {
      status: "ok",
      uptime: process.uptime(),
      network: this.service.getSummary(),
    };
  }
}
