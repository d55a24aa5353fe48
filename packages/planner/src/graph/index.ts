/**
 * Feasibility graph module.
 *
 * Nodes + gateway + failed connections -> pairwise distance checks -> graph
 */

export {
  buildFeasibilityGraph,
  type FeasibilityThresholds,
  type FeasibilityGraphStats,
  type FeasibilityGraphResult,
} from "./feasibility-graph.js";
