/**
 * Full planning pipeline.
 *
 * 1. Feasibility graph from distances + failed connections
 * 2. Capacitated breadth-first tree from the gateway
 * 3. Frequency assignment down the tree
 * 4. Join tree position and channels back onto the node records
 *
 * Every run is a full recomputation from its inputs; nothing is carried
 * over between runs.
 */

import {
  GATEWAY_ID,
  InvalidNodeError,
  NoGatewayError,
  type Coordinate,
  type Gateway,
  type PlannedNode,
  type PlannerConfig,
  type PlanResult,
  type RelayNode,
} from "../domain/index.js";
import { buildFrequencyPool, assignFrequencies } from "../frequency/index.js";
import { haversineDistanceKm } from "../geo/index.js";
import { buildFeasibilityGraph, type FeasibilityThresholds } from "../graph/index.js";
import type { FailedConnectionLookup } from "../overrides/index.js";
import { buildNetworkTree } from "../tree/index.js";

/**
 * Plan a network: graph -> tree -> frequencies.
 *
 * @param gateway - The gateway; null means it has not been placed yet
 * @param nodes - Relay nodes with unique ids, in node order
 * @param overrides - Failed connections to exclude
 * @throws NoGatewayError when no gateway is set
 * @throws InvalidNodeError on duplicate or reserved node ids
 */
export function planNetwork(
  gateway: Gateway | null,
  nodes: readonly RelayNode[],
  overrides: FailedConnectionLookup,
  config: PlannerConfig,
): PlanResult {
  if (!gateway) {
    throw new NoGatewayError();
  }
  assertUniqueIds(nodes);

  const { graph, evaluations } = buildFeasibilityGraph(gateway, nodes, overrides, {
    gatewayThresholdKm: config.gatewayThresholdKm,
    nodeThresholdKm: config.nodeThresholdKm,
  });

  const tree = buildNetworkTree(
    graph,
    nodes.map((node) => node.id),
    {
      maxChildrenPerNode: config.maxChildrenPerNode,
      gatewayMaxChildren: config.gatewayMaxChildren,
    },
  );

  const frequencies = assignFrequencies(tree, {
    pool: buildFrequencyPool(config.frequencyPoolRange),
    gatewayDownlinkFrequency: config.gatewayDownlinkFrequency,
    onExhaustion: config.onExhaustion,
  });

  const planned: PlannedNode[] = nodes.map((node) => {
    const link = tree.links.get(node.id);
    return {
      id: node.id,
      coordinate: { ...node.coordinate },
      gatewayEligible: node.gatewayEligible,
      parentId: link?.parentId ?? null,
      childIds: link ? [...link.childIds] : [],
      uplinkFrequency: frequencies.uplink.get(node.id) ?? null,
      downlinkFrequency: frequencies.downlink.get(node.id) ?? null,
      reachable: link !== undefined,
    };
  });

  return {
    gateway: {
      id: GATEWAY_ID,
      coordinate: { ...gateway.coordinate },
      downlinkFrequency: frequencies.gatewayDownlink,
      childIds: [...(tree.links.get(GATEWAY_ID)?.childIds ?? [])],
    },
    nodes: planned,
    unreachableIds: tree.unreachableIds,
    reachableCount: tree.reachableCount,
    frequencyOutcome: frequencies.outcome,
    evaluations,
  };
}

function assertUniqueIds(nodes: readonly RelayNode[]): void {
  const seen = new Set<string>();
  for (const node of nodes) {
    if (node.id === GATEWAY_ID) {
      throw new InvalidNodeError(`"${GATEWAY_ID}" is reserved for the gateway`);
    }
    if (seen.has(node.id)) {
      throw new InvalidNodeError(`Duplicate node id: ${node.id}`);
    }
    seen.add(node.id);
  }
}

/**
 * Pre-classify a new node's gateway eligibility before it is inserted.
 *
 * Eligible when the gateway is within the gateway threshold (inclusive) or
 * any existing node is within the node threshold (strict), ignoring pairs
 * marked as failed. Overrides only apply when the candidate already has an
 * id; the candidate itself is never compared against.
 */
export function evaluateSingleNodeEligibility(
  coordinate: Coordinate,
  gateway: Gateway | null,
  existingNodes: readonly RelayNode[],
  overrides: FailedConnectionLookup,
  thresholds: FeasibilityThresholds,
  candidateId?: string,
): boolean {
  const isFailed = (otherId: string) =>
    candidateId !== undefined && overrides.contains(candidateId, otherId);

  if (
    gateway &&
    !isFailed(GATEWAY_ID) &&
    haversineDistanceKm(coordinate, gateway.coordinate) <= thresholds.gatewayThresholdKm
  ) {
    return true;
  }

  return existingNodes.some(
    (node) =>
      node.id !== candidateId &&
      !isFailed(node.id) &&
      haversineDistanceKm(coordinate, node.coordinate) < thresholds.nodeThresholdKm,
  );
}
