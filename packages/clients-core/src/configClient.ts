import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  ConfigDefaultsResponse,
  ProfileListItem,
  SavedProfile,
  SaveProfileRequest,
} from "./types.js";

export class ConfigClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/config", config);
  }

  /** Load the base planner config */
  public async getDefaults(): Promise<ConfigDefaultsResponse> {
    return this.client.get<ConfigDefaultsResponse>({ path: "defaults" });
  }

  /** Load the planner config for a named profile */
  public async getProfile(profileName: string): Promise<ConfigDefaultsResponse> {
    return this.client.get<ConfigDefaultsResponse>({
      path: "defaults",
      query: { profile: profileName },
    });
  }

  /** List all available planner profiles */
  public async listProfiles(): Promise<ProfileListItem[]> {
    return this.client.get<ProfileListItem[]>({ path: "profiles" });
  }

  /** Save settings as a named profile */
  public async saveProfile(request: SaveProfileRequest): Promise<SavedProfile> {
    return this.client.post<SavedProfile>({ path: "profiles", body: request });
  }
}
