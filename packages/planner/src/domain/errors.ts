/**
 * Planner error taxonomy.
 *
 * Every error carries a stable `code` so outer layers (HTTP, CLI) can map
 * it without matching on messages.
 */

export type PlannerErrorCode =
  | "invalid-override-pair"
  | "invalid-node"
  | "node-not-found"
  | "override-not-found"
  | "no-gateway"
  | "frequency-exhausted"
  | "invalid-config"
  | "profile-not-found";

export class PlannerError extends Error {
  readonly code: PlannerErrorCode;

  constructor(code: PlannerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A failed connection references an identity that does not exist */
export class InvalidOverridePairError extends PlannerError {
  readonly unknownId: string;

  constructor(unknownId: string, message?: string) {
    super(
      "invalid-override-pair",
      message ?? `Unknown node in failed connection: ${unknownId}`,
    );
    this.unknownId = unknownId;
  }
}

export class InvalidNodeError extends PlannerError {
  constructor(message: string) {
    super("invalid-node", message);
  }
}

export class NodeNotFoundError extends PlannerError {
  readonly nodeId: string;

  constructor(nodeId: string) {
    super("node-not-found", `Node not found: ${nodeId}`);
    this.nodeId = nodeId;
  }
}

export class OverrideNotFoundError extends PlannerError {
  readonly pair: { a: string; b: string };

  constructor(a: string, b: string) {
    super("override-not-found", `No failed connection between ${a} and ${b}`);
    this.pair = { a, b };
  }
}

/** A tree or frequency operation was attempted before the gateway was placed */
export class NoGatewayError extends PlannerError {
  constructor() {
    super("no-gateway", "Gateway position has not been set");
  }
}

/** The frequency pool ran dry before every branching node was served */
export class FrequencyExhaustedError extends PlannerError {
  readonly nodeId: string;
  readonly unassignedCount: number;

  constructor(nodeId: string, unassignedCount: number) {
    super(
      "frequency-exhausted",
      `No downlink frequency left for ${nodeId} (${unassignedCount} node(s) unassigned)`,
    );
    this.nodeId = nodeId;
    this.unassignedCount = unassignedCount;
  }
}

export class InvalidConfigError extends PlannerError {
  readonly fields: Record<string, string>;

  constructor(fields: Record<string, string>) {
    super(
      "invalid-config",
      `Invalid planner config: ${Object.entries(fields)
        .map(([field, problem]) => `${field} ${problem}`)
        .join("; ")}`,
    );
    this.fields = fields;
  }
}

export class ProfileNotFoundError extends PlannerError {
  readonly profileName: string;

  constructor(profileName: string) {
    super("profile-not-found", `Planner profile not found: ${profileName}`);
    this.profileName = profileName;
  }
}
