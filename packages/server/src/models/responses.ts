import type {
  PlannerConfig,
  PlanResult,
  ProfileInfo,
} from "@lora-planner/planner";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  network: {
    nodes: number;
    failedConnections: number;
    hasGateway: boolean;
  };
}

export interface PlanResponse {
  /** The config the run used, after profile and overrides */
  config: PlannerConfig;
  plan: PlanResult;
  /** One CONFIG_NODE line per attached node */
  commands: string[];
}

export type ProfileListItem = ProfileInfo;

export type ConfigDefaultsResponse = PlannerConfig & { _profile?: ProfileInfo };

export interface ErrorResponse {
  message: string;
  code?: string;
  details?: unknown;
}
