/**
 * Plan results - the output of a planning run.
 *
 * A run builds a feasibility graph, grows a capacity-constrained tree over it
 * from the gateway, and assigns frequencies down the tree.
 */

import type { ExhaustionPolicy } from "./config.js";
import type { Gateway, LinkEvaluation, RelayNode } from "./network.js";

/** Parent/children of one identity in a tree */
export interface TreeLink {
  /** null for the root */
  parentId: string | null;
  childIds: string[];
}

/** Rooted tree produced by the tree builder */
export interface NetworkTree {
  rootId: string;
  /** Root plus every attached node, in attachment order */
  links: Map<string, TreeLink>;
  /** Nodes that could not be attached, in node order */
  unreachableIds: string[];
  /** Number of attached nodes (root excluded) */
  reachableCount: number;
}

/** Result of a frequency assignment run */
export type FrequencyOutcome =
  | { status: "success" }
  | {
      status: "exhausted";
      policy: ExhaustionPolicy;
      /** First node that needed a downlink the pool could not supply */
      nodeId: string;
      /** Nodes left without a downlink (policy "skip" only continues past them) */
      skippedIds: string[];
      /** Attached nodes still missing an uplink, or a downlink they need */
      unassignedCount: number;
    };

export interface FrequencyAssignment {
  gatewayDownlink: number;
  uplink: Map<string, number>;
  downlink: Map<string, number>;
  outcome: FrequencyOutcome;
}

/** A relay node joined with its tree position and channels */
export interface PlannedNode extends RelayNode {
  parentId: string | null;
  childIds: string[];
  uplinkFrequency: number | null;
  downlinkFrequency: number | null;
  reachable: boolean;
}

export interface PlannedGateway extends Gateway {
  downlinkFrequency: number;
  childIds: string[];
}

export interface PlanResult {
  gateway: PlannedGateway;
  /** Every node, in node order */
  nodes: PlannedNode[];
  unreachableIds: string[];
  reachableCount: number;
  frequencyOutcome: FrequencyOutcome;
  /** Per-pair feasibility diagnostics, for reporting only */
  evaluations: LinkEvaluation[];
}
