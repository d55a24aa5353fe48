/**
 * Layered JSON config system for planner settings.
 *
 * A base config holds every setting; named profiles are partial overrides
 * merged on top of it. Request-level overrides merge on top of either.
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import {
  InvalidConfigError,
  ProfileNotFoundError,
  type ExhaustionPolicy,
  type PlannerConfig,
  type PlannerConfigOverrides,
} from "../domain/index.js";
import { DEFAULT_FREQUENCY_RANGE, DEFAULT_GATEWAY_DOWNLINK } from "../frequency/index.js";
import { DEFAULT_TREE_OPTIONS } from "../tree/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProfileConfig {
  name: string;
  description: string;
  overrides: PlannerConfigOverrides;
}

export interface ProfileInfo {
  name: string;
  description: string;
}

/** Gateway downlinks come from a 3-bit range */
export const GATEWAY_FREQUENCY_MAX = 7;

const EXHAUSTION_POLICIES: readonly ExhaustionPolicy[] = ["fail", "skip"];

/** Built-in defaults, used when no base config file is present */
export function getDefaultPlannerConfig(): PlannerConfig {
  return {
    gatewayThresholdKm: 5,
    nodeThresholdKm: 5,
    maxChildrenPerNode: DEFAULT_TREE_OPTIONS.maxChildrenPerNode,
    gatewayMaxChildren: DEFAULT_TREE_OPTIONS.gatewayMaxChildren,
    frequencyPoolRange: { ...DEFAULT_FREQUENCY_RANGE },
    gatewayDownlinkFrequency: DEFAULT_GATEWAY_DOWNLINK,
    onExhaustion: "fail",
  };
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/** Overrides win wherever they are defined; `null` is a value, not a gap. */
export function mergePlannerConfig(
  base: PlannerConfig,
  overrides: PlannerConfigOverrides = {},
): PlannerConfig {
  return {
    gatewayThresholdKm: overrides.gatewayThresholdKm ?? base.gatewayThresholdKm,
    nodeThresholdKm: overrides.nodeThresholdKm ?? base.nodeThresholdKm,
    maxChildrenPerNode: overrides.maxChildrenPerNode ?? base.maxChildrenPerNode,
    gatewayMaxChildren:
      overrides.gatewayMaxChildren === undefined
        ? base.gatewayMaxChildren
        : overrides.gatewayMaxChildren,
    frequencyPoolRange: {
      start: overrides.frequencyPoolRange?.start ?? base.frequencyPoolRange.start,
      end: overrides.frequencyPoolRange?.end ?? base.frequencyPoolRange.end,
    },
    gatewayDownlinkFrequency:
      overrides.gatewayDownlinkFrequency ?? base.gatewayDownlinkFrequency,
    onExhaustion: overrides.onExhaustion ?? base.onExhaustion,
  };
}

/** Minimal diff: only settings that differ from the base. */
export function diffPlannerConfig(
  base: PlannerConfig,
  current: PlannerConfig,
): PlannerConfigOverrides {
  const diff: PlannerConfigOverrides = {};
  if (current.gatewayThresholdKm !== base.gatewayThresholdKm) {
    diff.gatewayThresholdKm = current.gatewayThresholdKm;
  }
  if (current.nodeThresholdKm !== base.nodeThresholdKm) {
    diff.nodeThresholdKm = current.nodeThresholdKm;
  }
  if (current.maxChildrenPerNode !== base.maxChildrenPerNode) {
    diff.maxChildrenPerNode = current.maxChildrenPerNode;
  }
  if (current.gatewayMaxChildren !== base.gatewayMaxChildren) {
    diff.gatewayMaxChildren = current.gatewayMaxChildren;
  }
  if (current.frequencyPoolRange.start !== base.frequencyPoolRange.start) {
    diff.frequencyPoolRange = { start: current.frequencyPoolRange.start };
  }
  if (current.frequencyPoolRange.end !== base.frequencyPoolRange.end) {
    diff.frequencyPoolRange = {
      ...diff.frequencyPoolRange,
      end: current.frequencyPoolRange.end,
    };
  }
  if (current.gatewayDownlinkFrequency !== base.gatewayDownlinkFrequency) {
    diff.gatewayDownlinkFrequency = current.gatewayDownlinkFrequency;
  }
  if (current.onExhaustion !== base.onExhaustion) {
    diff.onExhaustion = current.onExhaustion;
  }
  return diff;
}

// ---------------------------------------------------------------------------
// Parse & validate
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOptionalNumber(value: unknown): value is number | undefined {
  return value === undefined || typeof value === "number";
}

function isExhaustionPolicy(value: unknown): value is ExhaustionPolicy {
  return EXHAUSTION_POLICIES.some((policy) => policy === value);
}

/**
 * Check the shape of untrusted overrides (JSON files, request bodies).
 * Unknown keys are ignored; ranges are checked by validatePlannerConfig.
 */
export function parseConfigOverrides(input: unknown): PlannerConfigOverrides {
  if (input === undefined || input === null) return {};
  if (!isRecord(input)) {
    throw new InvalidConfigError({ config: "must be an object" });
  }
  const raw: Record<string, unknown> = input;

  const problems: Record<string, string> = {};
  const overrides: PlannerConfigOverrides = {};

  const readNumber = (key: string): number | undefined => {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value !== "number") {
      problems[key] = "must be a number";
      return undefined;
    }
    return value;
  };

  overrides.gatewayThresholdKm = readNumber("gatewayThresholdKm");
  overrides.nodeThresholdKm = readNumber("nodeThresholdKm");
  overrides.maxChildrenPerNode = readNumber("maxChildrenPerNode");
  overrides.gatewayDownlinkFrequency = readNumber("gatewayDownlinkFrequency");

  const gatewayMaxChildren = raw["gatewayMaxChildren"];
  if (gatewayMaxChildren === null || typeof gatewayMaxChildren === "number") {
    overrides.gatewayMaxChildren = gatewayMaxChildren;
  } else if (gatewayMaxChildren !== undefined) {
    problems["gatewayMaxChildren"] = "must be a number or null";
  }

  const range = raw["frequencyPoolRange"];
  if (isRecord(range)) {
    const start = range["start"];
    const end = range["end"];
    if (!isOptionalNumber(start)) {
      problems["frequencyPoolRange.start"] = "must be a number";
    } else if (!isOptionalNumber(end)) {
      problems["frequencyPoolRange.end"] = "must be a number";
    } else {
      overrides.frequencyPoolRange = { start, end };
    }
  } else if (range !== undefined) {
    problems["frequencyPoolRange"] = "must be an object with start and end";
  }

  const onExhaustion = raw["onExhaustion"];
  if (isExhaustionPolicy(onExhaustion)) {
    overrides.onExhaustion = onExhaustion;
  } else if (onExhaustion !== undefined) {
    problems["onExhaustion"] = `must be one of ${EXHAUSTION_POLICIES.join(", ")}`;
  }

  if (Object.keys(problems).length > 0) {
    throw new InvalidConfigError(problems);
  }
  return overrides;
}

/** Throw InvalidConfigError listing every out-of-range setting. */
export function validatePlannerConfig(config: PlannerConfig): PlannerConfig {
  const problems: Record<string, string> = {};
  const isPositive = (value: number) => Number.isFinite(value) && value > 0;
  const isPositiveInt = (value: number) => Number.isInteger(value) && value > 0;

  if (!isPositive(config.gatewayThresholdKm)) {
    problems["gatewayThresholdKm"] = "must be a positive number";
  }
  if (!isPositive(config.nodeThresholdKm)) {
    problems["nodeThresholdKm"] = "must be a positive number";
  }
  if (!isPositiveInt(config.maxChildrenPerNode)) {
    problems["maxChildrenPerNode"] = "must be a positive integer";
  }
  if (config.gatewayMaxChildren !== null && !isPositiveInt(config.gatewayMaxChildren)) {
    problems["gatewayMaxChildren"] = "must be a positive integer or null";
  }

  const { start, end } = config.frequencyPoolRange;
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    problems["frequencyPoolRange"] = "must have integer bounds";
  } else if (start <= GATEWAY_FREQUENCY_MAX) {
    problems["frequencyPoolRange"] = `must start above the gateway range (0-${GATEWAY_FREQUENCY_MAX})`;
  } else if (start > end) {
    problems["frequencyPoolRange"] = "must not start after it ends";
  }

  const gatewayFrequency = config.gatewayDownlinkFrequency;
  if (
    !Number.isInteger(gatewayFrequency) ||
    gatewayFrequency < 0 ||
    gatewayFrequency > GATEWAY_FREQUENCY_MAX
  ) {
    problems["gatewayDownlinkFrequency"] = `must be an integer from 0 to ${GATEWAY_FREQUENCY_MAX}`;
  }

  if (!isExhaustionPolicy(config.onExhaustion)) {
    problems["onExhaustion"] = `must be one of ${EXHAUSTION_POLICIES.join(", ")}`;
  }

  if (Object.keys(problems).length > 0) {
    throw new InvalidConfigError(problems);
  }
  return config;
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/planner/`.
 * Works from both source (packages/planner/src/) and compiled (dist/) paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "planner");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // __dirname is packages/planner/src/config
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs", "planner");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/**
 * Load the base config. Falls back to built-in defaults when the file is
 * missing or not valid JSON; out-of-range values still throw.
 */
export function loadBaseConfig(configsRoot: string = findConfigsRoot()): PlannerConfig {
  const filePath = join(configsRoot, "base.json");
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch {
    return getDefaultPlannerConfig();
  }
  const overrides = parseConfigOverrides(parsed);
  return validatePlannerConfig(mergePlannerConfig(getDefaultPlannerConfig(), overrides));
}

function readProfile(filePath: string): ProfileConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch {
    throw new InvalidConfigError({ profile: `${filePath} is not valid JSON` });
  }
  if (!isRecord(parsed) || typeof parsed["name"] !== "string") {
    throw new InvalidConfigError({ profile: `${filePath} is not a profile` });
  }
  return {
    name: parsed["name"],
    description: typeof parsed["description"] === "string" ? parsed["description"] : "",
    overrides: parseConfigOverrides(parsed["overrides"]),
  };
}

function profileFileName(name: string): string {
  return name.toLowerCase().replace(/\s+/g, "-").replace(/[^a-z0-9-]/g, "");
}

/** Load a profile config, merging its overrides on top of the base. */
export function loadProfileConfig(
  profileName: string,
  configsRoot: string = findConfigsRoot(),
): PlannerConfig & { _profile: ProfileInfo } {
  const filePath = join(configsRoot, "profiles", `${profileFileName(profileName)}.json`);
  if (!existsSync(filePath)) {
    throw new ProfileNotFoundError(profileName);
  }

  const profile = readProfile(filePath);
  const merged = validatePlannerConfig(
    mergePlannerConfig(loadBaseConfig(configsRoot), profile.overrides),
  );

  return {
    ...merged,
    _profile: { name: profile.name, description: profile.description },
  };
}

/** List all available profiles from the profiles directory. */
export function listProfiles(configsRoot: string = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");
  if (!existsSync(profilesDir)) return [];

  const profiles: ProfileInfo[] = [];
  for (const file of readdirSync(profilesDir).filter((f) => f.endsWith(".json")).sort()) {
    try {
      const { name, description } = readProfile(join(profilesDir, file));
      profiles.push({ name, description });
    } catch {
      // Skip malformed files
      continue;
    }
  }
  return profiles;
}

export interface ResolveConfigOptions {
  /** Named profile to start from (base config otherwise) */
  profileName?: string;
  /** Untrusted per-run overrides */
  overrides?: unknown;
  configsRoot?: string;
}

/**
 * Resolve the config for one planning run: base or profile, then per-run
 * overrides, then validation.
 */
export function resolvePlannerConfig(options: ResolveConfigOptions = {}): PlannerConfig {
  const configsRoot = options.configsRoot ?? findConfigsRoot();
  let base: PlannerConfig = loadBaseConfig(configsRoot);
  if (options.profileName) {
    const { _profile: _info, ...profileConfig } = loadProfileConfig(
      options.profileName,
      configsRoot,
    );
    base = profileConfig;
  }
  return validatePlannerConfig(
    mergePlannerConfig(base, parseConfigOverrides(options.overrides)),
  );
}

// ---------------------------------------------------------------------------
// Save
// ---------------------------------------------------------------------------

/**
 * Write a profile holding only the settings that differ from the base.
 *
 * @returns the profile as written
 */
export function saveProfileConfig(
  name: string,
  description: string,
  config: PlannerConfig,
  configsRoot: string = findConfigsRoot(),
): ProfileConfig {
  validatePlannerConfig(config);
  const dir = join(configsRoot, "profiles");
  mkdirSync(dir, { recursive: true });

  const profile: ProfileConfig = {
    name,
    description,
    overrides: diffPlannerConfig(loadBaseConfig(configsRoot), config),
  };
  writeFileSync(
    join(dir, `${profileFileName(name)}.json`),
    JSON.stringify(profile, null, 2) + "\n",
    "utf-8",
  );
  return profile;
}
