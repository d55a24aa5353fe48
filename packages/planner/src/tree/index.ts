/**
 * Tree construction module.
 *
 * Feasibility graph -> breadth-first expansion with fan-out caps -> NetworkTree
 */

export {
  buildNetworkTree,
  DEFAULT_TREE_OPTIONS,
  type TreeBuilderOptions,
} from "./tree-builder.js";
