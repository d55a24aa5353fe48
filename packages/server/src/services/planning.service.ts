/**
 * Application service behind the HTTP API.
 *
 * Wraps the network store and the planner: inventory mutations run inside a
 * store transaction, planning runs read a snapshot and never write back.
 */

import {
  NodeNotFoundError,
  OverrideNotFoundError,
  generateConfigurationCommands,
  listProfiles,
  loadProfileConfig,
  saveProfileConfig,
  planToGeoJson,
  resolvePlannerConfig,
  throwIfExhausted,
  type ConnectionPair,
  type Coordinate,
  type Gateway,
  type NetworkSnapshot,
  type PlanGeoJsonCollection,
  type PlanGeoJsonOptions,
  type PlannerConfig,
  type PlanResult,
  type ProfileConfig,
  type ProfileInfo,
  type RelayNode,
} from "@lora-planner/planner";

import type { SqliteNetworkRepository } from "./sqlite-network-repository.js";

export interface PlanOptions {
  /** Named profile to start from */
  profileName?: string;
  /** Per-run config overrides (unvalidated) */
  config?: unknown;
}

export interface PlanRun {
  config: PlannerConfig;
  plan: PlanResult;
  commands: string[];
}

export interface NetworkSummary {
  nodes: number;
  failedConnections: number;
  hasGateway: boolean;
}

export class PlanningService {
  constructor(
    private readonly repository: SqliteNetworkRepository,
    private readonly configsRoot?: string,
  ) {}

  // ---------------------------------------------------------------------------
  // Inventory
  // ---------------------------------------------------------------------------

  getSnapshot(): NetworkSnapshot {
    return this.repository.load();
  }

  getSummary(): NetworkSummary {
    const state = this.repository.read();
    return {
      nodes: state.nodeCount,
      failedConnections: state.failedConnectionCount,
      hasGateway: state.getGateway() !== null,
    };
  }

  setGateway(coordinate: Coordinate): Gateway {
    const gateway = this.repository.update((state) => state.setGateway(coordinate));
    console.log(
      `[store] Gateway at (${coordinate.lat.toFixed(5)},${coordinate.lng.toFixed(5)})`,
    );
    return gateway;
  }

  /**
   * Insert or update a node. Without an explicit flag, gateway eligibility
   * is derived from the current network with the base config thresholds.
   */
  upsertNode(id: string, coordinate: Coordinate, gatewayEligible?: boolean): RelayNode {
    const node = this.repository.update((state) =>
      state.upsertNode({
        id,
        coordinate,
        gatewayEligible:
          gatewayEligible ??
          state.isEligibleForGateway(coordinate, this.resolveConfig({}), id),
      }),
    );
    console.log(
      `[store] Node ${node.id} at (${node.coordinate.lat.toFixed(5)},${node.coordinate.lng.toFixed(5)})` +
        ` eligible=${node.gatewayEligible}${gatewayEligible === undefined ? " (derived)" : ""}`,
    );
    return node;
  }

  /** @throws NodeNotFoundError when the node does not exist */
  removeNode(id: string): void {
    const removed = this.repository.update((state) => state.removeNode(id));
    if (!removed) {
      throw new NodeNotFoundError(id);
    }
    console.log(`[store] Removed node ${id}`);
  }

  listOverrides(): ConnectionPair[] {
    return this.repository.load().overrides;
  }

  addOverride(a: string, b: string): ConnectionPair {
    const pair = this.repository.update((state) => state.addFailedConnection(a, b));
    console.log(`[store] Marked ${pair.a} <-> ${pair.b} as failed`);
    return pair;
  }

  /** @throws OverrideNotFoundError when the pair is not marked as failed */
  removeOverride(a: string, b: string): void {
    const removed = this.repository.update((state) => state.removeFailedConnection(a, b));
    if (!removed) {
      throw new OverrideNotFoundError(a, b);
    }
    console.log(`[store] Cleared failed connection ${a} <-> ${b}`);
  }

  // ---------------------------------------------------------------------------
  // Config
  // ---------------------------------------------------------------------------

  listProfiles(): ProfileInfo[] {
    return listProfiles(this.configsRoot);
  }

  /** @throws ProfileNotFoundError when the profile does not exist */
  loadProfile(name: string): PlannerConfig & { _profile: ProfileInfo } {
    return loadProfileConfig(name, this.configsRoot);
  }

  /**
   * Store `overrides` merged over the base config as a named profile. Only
   * settings that differ from the base are written.
   *
   * @throws InvalidConfigError when the merged config is out of range
   */
  saveProfile(name: string, description: string, overrides?: unknown): ProfileConfig {
    const profile = saveProfileConfig(
      name,
      description,
      this.resolveConfig({ config: overrides }),
      this.configsRoot,
    );
    console.log(
      `[config] Saved profile ${profile.name} (${Object.keys(profile.overrides).length} override(s))`,
    );
    return profile;
  }

  resolveConfig(options: PlanOptions): PlannerConfig {
    return resolvePlannerConfig({
      profileName: options.profileName,
      overrides: options.config,
      configsRoot: this.configsRoot,
    });
  }

  // ---------------------------------------------------------------------------
  // Planning
  // ---------------------------------------------------------------------------

  /**
   * Plan the stored network.
   *
   * @throws FrequencyExhaustedError when the pool runs dry under "fail"
   */
  plan(options: PlanOptions = {}): PlanRun {
    const config = this.resolveConfig(options);
    const start = Date.now();
    const plan = this.repository.read().plan(config);
    console.log(
      `[plan] ${plan.reachableCount}/${plan.nodes.length} node(s) attached, ` +
        `gateway children=${plan.gateway.childIds.length} (${Date.now() - start}ms)`,
    );
    if (plan.unreachableIds.length > 0) {
      console.warn(`[plan] Unreachable: ${plan.unreachableIds.join(", ")}`);
    }

    const outcome = plan.frequencyOutcome;
    if (outcome.status === "exhausted") {
      console.error(
        `[plan] Frequency pool exhausted at ${outcome.nodeId} ` +
          `(policy=${outcome.policy}, unassigned=${outcome.unassignedCount})`,
      );
      if (outcome.policy === "fail") {
        throwIfExhausted(outcome);
      }
    }

    return { config, plan, commands: generateConfigurationCommands(plan) };
  }

  planGeoJson(
    options: PlanOptions = {},
    exportOptions: PlanGeoJsonOptions = {},
  ): PlanGeoJsonCollection {
    return planToGeoJson(this.plan(options).plan, exportOptions);
  }
}
