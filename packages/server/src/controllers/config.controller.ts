import { Controller } from "@tsoa/runtime";
import type { ProfileConfig } from "@lora-planner/planner";
import { parseSaveProfileRequest } from "../models/requests.js";
import type { ConfigDefaultsResponse, ProfileListItem } from "../models/responses.js";
import type { PlanningService } from "../services/planning.service.js";

export class ConfigController extends Controller {
  constructor(private readonly service: PlanningService) {
    super();
  }

  /** Load the base planner config, or a named profile merged over it */
  public async getDefaults(profile?: string): Promise<ConfigDefaultsResponse> {
    if (profile) {
      return this.service.loadProfile(profile);
    }
    return this.service.resolveConfig({});
  }

  /** List all available planner profiles */
  public async getProfiles(): Promise<ProfileListItem[]> {
    return this.service.listProfiles();
  }

  /** Save settings as a named profile */
  public async saveProfile(body: unknown): Promise<ProfileConfig> {
    const { name, description, config } = parseSaveProfileRequest(body);
    const profile = this.service.saveProfile(name, description ?? "", config);
    this.setStatus(201);
    return profile;
  }
}
