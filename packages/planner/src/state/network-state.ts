/**
 * NetworkState — the aggregate for one dataset.
 *
 * Holds the gateway, the ordered node registry and the failed connections,
 * and enforces the rules that tie them together. Planning reads a snapshot
 * of this state; nothing a run derives is written back.
 */

import {
  GATEWAY_ID,
  InvalidNodeError,
  InvalidOverridePairError,
  type ConnectionPair,
  type Coordinate,
  type Gateway,
  type NetworkSnapshot,
  type PlannerConfig,
  type PlanResult,
  type RelayNode,
} from "../domain/index.js";
import { ConnectionOverrideStore } from "../overrides/index.js";
import { evaluateSingleNodeEligibility, planNetwork } from "../pipeline/index.js";

/**
 * Load/save hooks implemented by a persistence collaborator.
 */
export interface NetworkRepository {
  load(): NetworkSnapshot;
  save(snapshot: NetworkSnapshot): void;
}

export interface NodeInput {
  id: string;
  coordinate: Coordinate;
  gatewayEligible: boolean;
}

export class NetworkState {
  private gateway: Gateway | null = null;
  private nodes = new Map<string, RelayNode>();
  private overrides = new ConnectionOverrideStore();

  static fromSnapshot(snapshot: NetworkSnapshot): NetworkState {
    const state = new NetworkState();
    if (snapshot.gateway) {
      state.setGateway(snapshot.gateway.coordinate);
    }
    for (const node of snapshot.nodes) {
      state.upsertNode(node);
    }
    for (const pair of snapshot.overrides) {
      state.addFailedConnection(pair.a, pair.b);
    }
    return state;
  }

  toSnapshot(): NetworkSnapshot {
    return {
      gateway: this.gateway
        ? { id: GATEWAY_ID, coordinate: { ...this.gateway.coordinate } }
        : null,
      nodes: this.listNodes(),
      overrides: this.overrides.list(),
    };
  }

  // ---------------------------------------------------------------------------
  // Gateway
  // ---------------------------------------------------------------------------

  getGateway(): Gateway | null {
    return this.gateway;
  }

  setGateway(coordinate: Coordinate): Gateway {
    this.gateway = { id: GATEWAY_ID, coordinate: { ...coordinate } };
    return this.gateway;
  }

  // ---------------------------------------------------------------------------
  // Nodes
  // ---------------------------------------------------------------------------

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): RelayNode | undefined {
    return this.nodes.get(id);
  }

  /** Nodes in insertion order; re-added ids keep their original position. */
  listNodes(): RelayNode[] {
    return [...this.nodes.values()].map((node) => ({
      ...node,
      coordinate: { ...node.coordinate },
    }));
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  /**
   * Insert a node, or overwrite the position and eligibility of an existing
   * one.
   */
  upsertNode(input: NodeInput): RelayNode {
    const { id } = input;
    if (id.trim().length === 0) {
      throw new InvalidNodeError("Node id must not be empty");
    }
    if (id !== id.trim()) {
      throw new InvalidNodeError(`Node id must not start or end with whitespace: "${id}"`);
    }
    if (id === GATEWAY_ID) {
      throw new InvalidNodeError(`"${GATEWAY_ID}" is reserved for the gateway`);
    }
    const node: RelayNode = {
      id,
      coordinate: { ...input.coordinate },
      gatewayEligible: input.gatewayEligible,
    };
    this.nodes.set(id, node);
    return node;
  }

  /**
   * Remove a node and every failed connection that references it.
   *
   * @returns whether the node existed
   */
  removeNode(id: string): boolean {
    if (!this.nodes.delete(id)) return false;
    this.overrides.removeAllFor(id);
    return true;
  }

  /**
   * Derive gateway eligibility for a node that is about to be added.
   */
  isEligibleForGateway(
    coordinate: Coordinate,
    config: Pick<PlannerConfig, "gatewayThresholdKm" | "nodeThresholdKm">,
    candidateId?: string,
  ): boolean {
    return evaluateSingleNodeEligibility(
      coordinate,
      this.gateway,
      this.listNodes(),
      this.overrides,
      config,
      candidateId,
    );
  }

  // ---------------------------------------------------------------------------
  // Failed connections
  // ---------------------------------------------------------------------------

  listFailedConnections(): ConnectionPair[] {
    return this.overrides.list();
  }

  get failedConnectionCount(): number {
    return this.overrides.size;
  }

  isFailedConnection(a: string, b: string): boolean {
    return this.overrides.contains(a, b);
  }

  /**
   * Mark a connection as failed. Both endpoints must exist (the gateway id
   * always does) and must differ.
   */
  addFailedConnection(a: string, b: string): ConnectionPair {
    for (const id of [a, b]) {
      if (id !== GATEWAY_ID && !this.nodes.has(id)) {
        throw new InvalidOverridePairError(id);
      }
    }
    if (a === b) {
      throw new InvalidOverridePairError(a, `A connection needs two distinct endpoints: ${a}`);
    }
    return this.overrides.add(a, b);
  }

  /** @returns whether the pair was marked as failed */
  removeFailedConnection(a: string, b: string): boolean {
    return this.overrides.remove(a, b);
  }

  // ---------------------------------------------------------------------------
  // Planning
  // ---------------------------------------------------------------------------

  /**
   * Run the full pipeline over the current state.
   *
   * @throws NoGatewayError when no gateway is set
   */
  plan(config: PlannerConfig): PlanResult {
    return planNetwork(this.gateway, this.listNodes(), this.overrides.clone(), config);
  }
}
