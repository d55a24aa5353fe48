/**
 * @lora-planner/planner
 *
 * Plans a tree-shaped LoRa network around a single gateway.
 *
 * Pipeline:
 * 1. Nodes + gateway + failed connections -> FeasibilityGraph
 * 2. Breadth-first expansion with fan-out caps -> NetworkTree
 * 3. Channel pool walked down the tree -> FrequencyAssignment
 * 4. Everything joined -> PlanResult
 */

// Domain types
export * from "./domain/index.js";

// Modules
export * from "./geo/index.js";
export * from "./overrides/index.js";
export * from "./graph/index.js";
export * from "./tree/index.js";
export * from "./frequency/index.js";
export * from "./pipeline/index.js";
export * from "./state/index.js";
export * from "./config/index.js";
export * from "./export/index.js";
