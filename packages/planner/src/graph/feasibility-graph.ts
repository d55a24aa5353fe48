/**
 * Build the feasibility graph for a planning run.
 *
 * Decides which pairs of devices can physically link, from great-circle
 * distance, the per-node gateway eligibility flag and the manually failed
 * connections. The graph is built fresh on every run.
 */

import {
  GATEWAY_ID,
  type FeasibilityGraph,
  type Gateway,
  type LinkEvaluation,
  type RejectionReason,
  type RelayNode,
} from "../domain/index.js";
import { haversineDistanceKm } from "../geo/index.js";
import type { FailedConnectionLookup } from "../overrides/index.js";

export interface FeasibilityThresholds {
  /** Gateway links are feasible up to and including this distance */
  gatewayThresholdKm: number;
  /** Node-to-node links are feasible strictly below this distance */
  nodeThresholdKm: number;
}

/**
 * Statistics about the graph building process.
 */
export interface FeasibilityGraphStats {
  /** Number of pairs evaluated (gateway pairs + node pairs) */
  pairsEvaluated: number;
  /** Number of undirected links in the graph */
  linksAvailable: number;
  /** Of which attach a node to the gateway */
  gatewayLinks: number;
  rejectedByOverride: number;
  rejectedByEligibility: number;
  rejectedByDistance: number;
}

export interface FeasibilityGraphResult {
  graph: FeasibilityGraph;
  /** One entry per evaluated pair, for reporting only */
  evaluations: LinkEvaluation[];
  stats: FeasibilityGraphStats;
}

/**
 * Build the feasibility graph.
 *
 * Algorithm:
 * 1. Register the gateway and every node with an empty neighbour list
 * 2. Gateway links, in node order: eligible AND distance <= gateway
 *    threshold AND not failed
 * 3. Node links, for every pair (i, j) with i < j in node order:
 *    distance < node threshold AND not failed
 *
 * Both directions of a link are recorded together, so neighbour order is
 * the order in which links were accepted.
 */
export function buildFeasibilityGraph(
  gateway: Gateway,
  nodes: readonly RelayNode[],
  failed: FailedConnectionLookup,
  thresholds: FeasibilityThresholds,
): FeasibilityGraphResult {
  const graph: FeasibilityGraph = new Map([[GATEWAY_ID, []]]);
  for (const node of nodes) {
    graph.set(node.id, []);
  }

  const evaluations: LinkEvaluation[] = [];
  const stats: FeasibilityGraphStats = {
    pairsEvaluated: 0,
    linksAvailable: 0,
    gatewayLinks: 0,
    rejectedByOverride: 0,
    rejectedByEligibility: 0,
    rejectedByDistance: 0,
  };

  const record = (
    from: string,
    to: string,
    distanceKm: number,
    reason: RejectionReason | null,
  ): void => {
    stats.pairsEvaluated++;
    if (reason === null) {
      addLink(graph, from, to);
      stats.linksAvailable++;
      evaluations.push({ from, to, distanceKm, status: "available" });
      return;
    }
    if (reason.kind === "failed-override") stats.rejectedByOverride++;
    else if (reason.kind === "no-direct-gateway-flag") stats.rejectedByEligibility++;
    else stats.rejectedByDistance++;
    evaluations.push({ from, to, distanceKm, status: "rejected", reason });
  };

  // Gateway links
  for (const node of nodes) {
    const distanceKm = haversineDistanceKm(gateway.coordinate, node.coordinate);
    let reason: RejectionReason | null = null;
    if (failed.contains(GATEWAY_ID, node.id)) {
      reason = { kind: "failed-override" };
    } else if (!node.gatewayEligible) {
      reason = { kind: "no-direct-gateway-flag" };
    } else if (distanceKm > thresholds.gatewayThresholdKm) {
      reason = { kind: "distance-exceeded", distanceKm };
    }
    if (reason === null) stats.gatewayLinks++;
    record(GATEWAY_ID, node.id, distanceKm, reason);
  }

  // Node-to-node links
  for (let i = 0; i < nodes.length; i++) {
    const first = nodes[i]!;
    for (let j = i + 1; j < nodes.length; j++) {
      const second = nodes[j]!;
      const distanceKm = haversineDistanceKm(first.coordinate, second.coordinate);
      let reason: RejectionReason | null = null;
      if (failed.contains(first.id, second.id)) {
        reason = { kind: "failed-override" };
      } else if (!(distanceKm < thresholds.nodeThresholdKm)) {
        reason = { kind: "distance-exceeded", distanceKm };
      }
      record(first.id, second.id, distanceKm, reason);
    }
  }

  return { graph, evaluations, stats };
}

/**
 * Record an undirected link in both neighbour lists.
 */
function addLink(graph: FeasibilityGraph, a: string, b: string): void {
  addNeighbour(graph, a, b);
  addNeighbour(graph, b, a);
}

function addNeighbour(graph: FeasibilityGraph, id: string, neighbour: string): void {
  const existing = graph.get(id);
  if (existing) {
    existing.push(neighbour);
  } else {
    graph.set(id, [neighbour]);
  }
}
