/**
 * API request/response types for the LoRa planner server.
 *
 * Domain records come from @lora-planner/types; the wrappers here mirror
 * the server's models.
 */

import type {
  Coordinate,
  PlannerConfig,
  PlannerConfigOverrides,
  PlanResult,
} from "@lora-planner/types";

export type {
  ConnectionPair,
  Coordinate,
  Gateway,
  NetworkSnapshot,
  PlannedNode,
  PlannerConfig,
  PlannerConfigOverrides,
  PlanResult,
  RelayNode,
} from "@lora-planner/types";

// ---------------------------------------------------------------------------
// Network
// ---------------------------------------------------------------------------

export interface UpsertNodeRequest {
  coordinate: Coordinate;
  /** Derived by the server when omitted */
  gatewayEligible?: boolean;
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

export interface PlanRequest {
  profileName?: string;
  config?: PlannerConfigOverrides;
}

export interface PlanGeoJsonRequest extends PlanRequest {
  includeUnreachable?: boolean;
  includeFeasibleLinks?: boolean;
}

export interface PlanResponse {
  config: PlannerConfig;
  plan: PlanResult;
  commands: string[];
}

export interface PlanGeoJson {
  type: "FeatureCollection";
  bbox?: [number, number, number, number];
  features: Array<{
    type: "Feature";
    geometry:
      | { type: "Point"; coordinates: [number, number] }
      | { type: "LineString"; coordinates: [number, number][] };
    properties: Record<string, unknown>;
  }>;
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface ProfileListItem {
  name: string;
  description: string;
}

export interface SaveProfileRequest {
  name: string;
  description?: string;
  /** Overrides merged over the base config before saving */
  config?: PlannerConfigOverrides;
}

/** A profile as stored: only settings that differ from the base */
export interface SavedProfile {
  name: string;
  description: string;
  overrides: PlannerConfigOverrides;
}

export type ConfigDefaultsResponse = PlannerConfig & { _profile?: ProfileListItem };

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: "ok";
  uptime: number;
  network: {
    nodes: number;
    failedConnections: number;
    hasGateway: boolean;
  };
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  message: string;
  code?: string;
  details?: unknown;
}
