/**
 * Device configuration commands for a planned network.
 *
 * One line per attached node, ready to send to the devices:
 *
 *   CONFIG_NODE relay-1: PARENT=gateway, FREQ_UP=3, FREQ_DOWN=16
 */

import type { PlannedNode, PlanResult } from "../domain/index.js";

/** Format the command line for one attached node. */
export function formatConfigurationCommand(node: PlannedNode): string | null {
  if (node.parentId === null) return null;
  let command = `CONFIG_NODE ${node.id}: PARENT=${node.parentId}, FREQ_UP=${node.uplinkFrequency ?? "none"}`;
  if (node.downlinkFrequency !== null) {
    command += `, FREQ_DOWN=${node.downlinkFrequency}`;
  }
  return command;
}

/**
 * Commands for every attached node, in node order. Unreachable nodes are
 * not configured.
 */
export function generateConfigurationCommands(plan: PlanResult): string[] {
  const commands: string[] = [];
  for (const node of plan.nodes) {
    const command = formatConfigurationCommand(node);
    if (command !== null) commands.push(command);
  }
  return commands;
}
