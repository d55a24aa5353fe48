/**
 * Core domain model for the LoRa tree planner.
 *
 * - Network: gateway, relay nodes, failed connections
 * - Graph: which pairs of devices can physically link
 * - Plan: the tree and frequencies derived from a network
 */

export * from "@lora-planner/types";
export * from "./errors.js";
