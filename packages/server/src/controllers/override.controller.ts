import { Controller } from "@tsoa/runtime";
import type { ConnectionPair } from "@lora-planner/planner";
import { parseAddOverrideRequest } from "../models/requests.js";
import type { PlanningService } from "../services/planning.service.js";

export class OverrideController extends Controller {
  constructor(private readonly service: PlanningService) {
    super();
  }

  /** Connections marked as failed in the field */
  public async listOverrides(): Promise<ConnectionPair[]> {
    return this.service.listOverrides();
  }

  public async addOverride(body: unknown): Promise<ConnectionPair> {
    const { a, b } = parseAddOverrideRequest(body);
    const pair = this.service.addOverride(a, b);
    this.setStatus(201);
    return pair;
  }

  public async removeOverride(a: string, b: string): Promise<void> {
    this.service.removeOverride(a, b);
    this.setStatus(204);
  }
}
