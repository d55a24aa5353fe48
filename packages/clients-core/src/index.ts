// Base
export {
  BaseClient,
  PlannerApiError,
  toPlannerApiError,
  type ClientConfig,
  type RequestParams,
} from "./baseClient.js";

// Domain clients
export { NetworkClient } from "./networkClient.js";
export { OverrideClient } from "./overrideClient.js";
export { PlanClient } from "./planClient.js";
export { ConfigClient } from "./configClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Network
  Coordinate,
  Gateway,
  RelayNode,
  ConnectionPair,
  NetworkSnapshot,
  UpsertNodeRequest,
  // Planning
  PlannerConfig,
  PlannerConfigOverrides,
  PlannedNode,
  PlanResult,
  PlanRequest,
  PlanGeoJsonRequest,
  PlanResponse,
  PlanGeoJson,
  // Config
  ProfileListItem,
  ConfigDefaultsResponse,
  SaveProfileRequest,
  SavedProfile,
  // Health
  HealthResponse,
  // Errors
  ErrorResponse,
} from "./types.js";
