/**
 * Capacitated tree construction.
 *
 * Grows a tree over the feasibility graph breadth-first from the gateway,
 * attaching each node to the first dequeued neighbour that still has room.
 * The result is "first reachable within capacity", not a shortest-path or
 * minimum-edge tree: expansion follows each node's recorded neighbour order
 * and capacity is checked eagerly, which makes the tree deterministic for a
 * given graph.
 */

import {
  GATEWAY_ID,
  type FeasibilityGraph,
  type NetworkTree,
  type TreeLink,
} from "../domain/index.js";

export interface TreeBuilderOptions {
  /** Fan-out cap for every relay node */
  maxChildrenPerNode: number;
  /** Fan-out cap for the gateway; null means unlimited */
  gatewayMaxChildren: number | null;
}

/** Default options for tree building */
export const DEFAULT_TREE_OPTIONS: TreeBuilderOptions = {
  maxChildrenPerNode: 4,
  gatewayMaxChildren: null,
};

/**
 * Build a rooted tree from the feasibility graph.
 *
 * Pure: returns a fresh tree and never touches the node records, so there
 * is no per-run state to reset.
 *
 * @param graph - Feasibility graph (gateway id included)
 * @param nodeIds - Every relay node id, in node order
 */
export function buildNetworkTree(
  graph: FeasibilityGraph,
  nodeIds: readonly string[],
  options: TreeBuilderOptions = DEFAULT_TREE_OPTIONS,
): NetworkTree {
  const known = new Set(nodeIds);
  const root: TreeLink = { parentId: null, childIds: [] };
  const links = new Map<string, TreeLink>([[GATEWAY_ID, root]]);

  const capacityOf = (id: string): number =>
    id === GATEWAY_ID
      ? (options.gatewayMaxChildren ?? Number.POSITIVE_INFINITY)
      : options.maxChildrenPerNode;

  // FIFO frontier, consumed by cursor
  const queue: { id: string; link: TreeLink }[] = [{ id: GATEWAY_ID, link: root }];
  let reachableCount = 0;

  for (let head = 0; head < queue.length; head++) {
    const { id: current, link: currentLink } = queue[head]!;
    const capacity = capacityOf(current);

    for (const neighbour of graph.get(current) ?? []) {
      if (neighbour === GATEWAY_ID || !known.has(neighbour)) continue;
      if (links.has(neighbour)) continue;
      if (currentLink.childIds.length >= capacity) continue;

      const link: TreeLink = { parentId: current, childIds: [] };
      links.set(neighbour, link);
      currentLink.childIds.push(neighbour);
      queue.push({ id: neighbour, link });
      reachableCount++;
    }
  }

  const unreachableIds = nodeIds.filter((id) => !links.has(id));

  return { rootId: GATEWAY_ID, links, unreachableIds, reachableCount };
}
