/**
 * @lora-planner/types
 *
 * Shared domain types for the LoRa tree planner.
 *
 * - Network: gateway, relay nodes, failed connections, feasibility graph
 * - Config: thresholds, fan-out caps, frequency pool
 * - Plan: tree, frequency assignment, the result of a planning run
 */

export * from "./geo.js";
export * from "./network.js";
export * from "./config.js";
export * from "./plan.js";
