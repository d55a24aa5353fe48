/**
 * Frequency assignment along a network tree.
 *
 * Each node transmits toward its parent on the parent's downlink channel and
 * listens for its own children on a downlink drawn from a shared pool. The
 * gateway's downlink is a fixed channel from a separate 0-7 range.
 */

import {
  FrequencyExhaustedError,
  GATEWAY_ID,
  type ExhaustionPolicy,
  type FrequencyAssignment,
  type FrequencyOutcome,
  type FrequencyRange,
  type NetworkTree,
} from "../domain/index.js";

export interface FrequencyAssignerOptions {
  /** Downlink channels for relay nodes, consumed front to back */
  pool: readonly number[];
  gatewayDownlinkFrequency: number;
  onExhaustion: ExhaustionPolicy;
}

/** Default node-to-node channel range */
export const DEFAULT_FREQUENCY_RANGE: FrequencyRange = { start: 16, end: 30 };

/** Default gateway downlink channel */
export const DEFAULT_GATEWAY_DOWNLINK = 3;

/** Expand an inclusive range into an ordered pool of channel ids. */
export function buildFrequencyPool(range: FrequencyRange): number[] {
  const pool: number[] = [];
  for (let channel = range.start; channel <= range.end; channel++) {
    pool.push(channel);
  }
  return pool;
}

/**
 * Assign uplink/downlink channels breadth-first from the gateway.
 *
 * The pool is copied, never mutated, so every run starts from the full
 * sequence. When the pool runs dry:
 * - "fail" stops the walk at the node that could not be served
 * - "skip" leaves that node without a downlink (its children then get no
 *   uplink) and keeps walking
 */
export function assignFrequencies(
  tree: NetworkTree,
  options: FrequencyAssignerOptions,
): FrequencyAssignment {
  const pool = [...options.pool];
  const gatewayDownlink = options.gatewayDownlinkFrequency;
  const uplink = new Map<string, number>();
  const downlink = new Map<string, number>();
  const skippedIds: string[] = [];

  const root = tree.links.get(tree.rootId);
  const queue: string[] = root ? [...root.childIds] : [];

  for (let head = 0; head < queue.length; head++) {
    const id = queue[head]!;
    const link = tree.links.get(id);
    if (!link) continue;

    const parentDownlink =
      link.parentId === GATEWAY_ID
        ? gatewayDownlink
        : link.parentId === null
          ? undefined
          : downlink.get(link.parentId);
    if (parentDownlink !== undefined) {
      uplink.set(id, parentDownlink);
    }

    if (link.childIds.length > 0) {
      const channel = pool.shift();
      if (channel === undefined) {
        skippedIds.push(id);
        if (options.onExhaustion === "fail") break;
      } else {
        downlink.set(id, channel);
      }
    }

    queue.push(...link.childIds);
  }

  const firstSkipped = skippedIds[0];
  const outcome: FrequencyOutcome =
    firstSkipped === undefined
      ? { status: "success" }
      : {
          status: "exhausted",
          policy: options.onExhaustion,
          nodeId: firstSkipped,
          skippedIds,
          unassignedCount: countUnassigned(tree, uplink, downlink),
        };

  return { gatewayDownlink, uplink, downlink, outcome };
}

/**
 * Attached nodes still missing an uplink, or a downlink their children need.
 */
function countUnassigned(
  tree: NetworkTree,
  uplink: Map<string, number>,
  downlink: Map<string, number>,
): number {
  let count = 0;
  for (const [id, link] of tree.links) {
    if (id === tree.rootId) continue;
    if (!uplink.has(id) || (link.childIds.length > 0 && !downlink.has(id))) {
      count++;
    }
  }
  return count;
}

/**
 * Raise a FrequencyExhaustedError for an exhausted outcome.
 */
export function throwIfExhausted(outcome: FrequencyOutcome): void {
  if (outcome.status === "exhausted") {
    throw new FrequencyExhaustedError(outcome.nodeId, outcome.unassignedCount);
  }
}
