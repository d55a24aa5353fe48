/**
 * Network inventory: the gateway, the relay/leaf nodes around it and the
 * links between them.
 *
 * These records describe what was deployed or surveyed. Everything derived
 * by a planning run (parents, children, frequencies) lives in the plan
 * result instead, so a record can be planned any number of times.
 */

import type { Coordinate } from "./geo.js";

/** Well-known identity of the single gateway in every network */
export const GATEWAY_ID = "gateway";

export type GatewayId = typeof GATEWAY_ID;

/** The network's root radio concentrator */
export interface Gateway {
  id: GatewayId;
  coordinate: Coordinate;
}

/** A relay or leaf radio device */
export interface RelayNode {
  /** Unique within the node set; never equal to GATEWAY_ID */
  id: string;
  coordinate: Coordinate;
  /** May attach directly to the gateway */
  gatewayEligible: boolean;
}

/**
 * An unordered pair of identities in canonical order (`a < b`).
 * The gateway id is a valid endpoint.
 */
export interface ConnectionPair {
  a: string;
  b: string;
}

/**
 * Undirected adjacency derived from distance thresholds and failed
 * connections: identity -> neighbour ids, in the order they were recorded.
 */
export type FeasibilityGraph = Map<string, string[]>;

/** Why a pair of devices cannot link */
export type RejectionReason =
  | { kind: "failed-override" }
  | { kind: "no-direct-gateway-flag" }
  | { kind: "distance-exceeded"; distanceKm: number };

/** Outcome of evaluating one candidate link while building the graph */
export type LinkEvaluation =
  | { from: string; to: string; distanceKm: number; status: "available" }
  | {
      from: string;
      to: string;
      distanceKm: number;
      status: "rejected";
      reason: RejectionReason;
    };

/** Everything a persistence collaborator loads and saves for one dataset */
export interface NetworkSnapshot {
  gateway: Gateway | null;
  nodes: RelayNode[];
  /** Manually failed connections */
  overrides: ConnectionPair[];
}
