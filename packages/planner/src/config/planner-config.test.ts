import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  diffPlannerConfig,
  findConfigsRoot,
  getDefaultPlannerConfig,
  listProfiles,
  loadBaseConfig,
  loadProfileConfig,
  mergePlannerConfig,
  parseConfigOverrides,
  resolvePlannerConfig,
  saveProfileConfig,
  validatePlannerConfig,
} from "./planner-config.js";
import { InvalidConfigError, ProfileNotFoundError } from "../domain/index.js";

describe("mergePlannerConfig", () => {
  it("keeps base values where overrides are absent", () => {
    const merged = mergePlannerConfig(getDefaultPlannerConfig(), {
      nodeThresholdKm: 2,
      frequencyPoolRange: { end: 20 },
    });
    expect(merged.nodeThresholdKm).toBe(2);
    expect(merged.gatewayThresholdKm).toBe(5);
    expect(merged.frequencyPoolRange).toEqual({ start: 16, end: 20 });
  });

  it("treats an explicit null gateway cap as unlimited", () => {
    const capped = { ...getDefaultPlannerConfig(), gatewayMaxChildren: 4 };
    expect(mergePlannerConfig(capped, { gatewayMaxChildren: null }).gatewayMaxChildren).toBeNull();
    expect(mergePlannerConfig(capped, {}).gatewayMaxChildren).toBe(4);
  });
});

describe("diffPlannerConfig", () => {
  it("returns only changed settings", () => {
    const base = getDefaultPlannerConfig();
    const current = mergePlannerConfig(base, {
      maxChildrenPerNode: 2,
      frequencyPoolRange: { end: 20 },
    });
    expect(diffPlannerConfig(base, current)).toEqual({
      maxChildrenPerNode: 2,
      frequencyPoolRange: { end: 20 },
    });
    expect(diffPlannerConfig(base, base)).toEqual({});
  });
});

describe("parseConfigOverrides", () => {
  it("treats missing input as no overrides", () => {
    expect(parseConfigOverrides(undefined)).toEqual({});
    expect(parseConfigOverrides(null)).toEqual({});
  });

  it("reports every badly typed field", () => {
    try {
      parseConfigOverrides({
        gatewayThresholdKm: "5",
        onExhaustion: "retry",
        gatewayMaxChildren: "none",
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      if (err instanceof InvalidConfigError) {
        expect(err.fields).toEqual({
          gatewayThresholdKm: "must be a number",
          gatewayMaxChildren: "must be a number or null",
          onExhaustion: "must be one of fail, skip",
        });
      }
    }
  });

  it("rejects non-objects", () => {
    expect(() => parseConfigOverrides([1, 2])).toThrow(InvalidConfigError);
  });
});

describe("validatePlannerConfig", () => {
  it("accepts the defaults", () => {
    const config = getDefaultPlannerConfig();
    expect(validatePlannerConfig(config)).toBe(config);
  });

  it("rejects a pool overlapping the gateway range", () => {
    const config = mergePlannerConfig(getDefaultPlannerConfig(), {
      frequencyPoolRange: { start: 5 },
    });
    expect(() => validatePlannerConfig(config)).toThrow(/frequencyPoolRange/);
  });

  it("rejects an inverted pool and a gateway channel out of range", () => {
    const config = mergePlannerConfig(getDefaultPlannerConfig(), {
      frequencyPoolRange: { start: 20, end: 18 },
      gatewayDownlinkFrequency: 9,
      maxChildrenPerNode: 0,
    });
    try {
      validatePlannerConfig(config);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      if (err instanceof InvalidConfigError) {
        expect(Object.keys(err.fields).sort()).toEqual([
          "frequencyPoolRange",
          "gatewayDownlinkFrequency",
          "maxChildrenPerNode",
        ]);
      }
    }
  });
});

describe("shipped configs", () => {
  it("base config matches the built-in defaults", () => {
    expect(loadBaseConfig(findConfigsRoot())).toEqual(getDefaultPlannerConfig());
  });

  it("capped-gateway profile limits the gateway", () => {
    const config = loadProfileConfig("capped-gateway");
    expect(config.gatewayMaxChildren).toBe(4);
    expect(config.maxChildrenPerNode).toBe(4);
    expect(config._profile.name).toBe("capped-gateway");
  });

  it("lists shipped profiles by file name", () => {
    expect(listProfiles().map((p) => p.name)).toEqual(["capped-gateway", "dense-urban"]);
  });
});

describe("profiles on disk", () => {
  let configsRoot: string;

  beforeEach(() => {
    configsRoot = mkdtempSync(join(tmpdir(), "planner-config-test-"));
  });

  afterEach(() => {
    rmSync(configsRoot, { recursive: true, force: true });
  });

  it("falls back to defaults without a base file", () => {
    expect(loadBaseConfig(configsRoot)).toEqual(getDefaultPlannerConfig());
  });

  it("reads a partial base file on top of the defaults", () => {
    writeFileSync(join(configsRoot, "base.json"), JSON.stringify({ nodeThresholdKm: 3 }));
    expect(loadBaseConfig(configsRoot).nodeThresholdKm).toBe(3);
  });

  it("falls back to defaults when the base file is not valid JSON", () => {
    writeFileSync(join(configsRoot, "base.json"), "{ not json");
    expect(loadBaseConfig(configsRoot)).toEqual(getDefaultPlannerConfig());
    expect(resolvePlannerConfig({ configsRoot })).toEqual(getDefaultPlannerConfig());
  });

  it("still rejects a base file with out-of-range values", () => {
    writeFileSync(join(configsRoot, "base.json"), JSON.stringify({ maxChildrenPerNode: 0 }));
    expect(() => loadBaseConfig(configsRoot)).toThrow(InvalidConfigError);
  });

  it("rejects a profile file that is not valid JSON", () => {
    mkdirSync(join(configsRoot, "profiles"));
    writeFileSync(join(configsRoot, "profiles", "broken.json"), "{ not json");
    expect(() => loadProfileConfig("broken", configsRoot)).toThrow(InvalidConfigError);
  });

  it("throws ProfileNotFoundError for unknown profiles", () => {
    expect(() => loadProfileConfig("nope", configsRoot)).toThrow(ProfileNotFoundError);
  });

  it("saves a minimal diff and reads it back", () => {
    const config = mergePlannerConfig(getDefaultPlannerConfig(), {
      maxChildrenPerNode: 2,
      onExhaustion: "skip",
    });

    const saved = saveProfileConfig("Sparse Rural", "Few nodes, long links", config, configsRoot);
    expect(saved.overrides).toEqual({ maxChildrenPerNode: 2, onExhaustion: "skip" });

    const written: unknown = JSON.parse(
      readFileSync(join(configsRoot, "profiles", "sparse-rural.json"), "utf-8"),
    );
    expect(written).toEqual({
      name: "Sparse Rural",
      description: "Few nodes, long links",
      overrides: { maxChildrenPerNode: 2, onExhaustion: "skip" },
    });

    const { _profile, ...loaded } = loadProfileConfig("Sparse Rural", configsRoot);
    expect(loaded).toEqual(config);
    expect(_profile).toEqual({ name: "Sparse Rural", description: "Few nodes, long links" });
  });

  it("skips malformed profile files when listing", () => {
    mkdirSync(join(configsRoot, "profiles"));
    writeFileSync(join(configsRoot, "profiles", "broken.json"), "{");
    saveProfileConfig("valid", "", getDefaultPlannerConfig(), configsRoot);
    expect(listProfiles(configsRoot)).toEqual([{ name: "valid", description: "" }]);
  });

  it("resolves profile then per-run overrides", () => {
    saveProfileConfig(
      "wide",
      "",
      mergePlannerConfig(getDefaultPlannerConfig(), { nodeThresholdKm: 8 }),
      configsRoot,
    );
    const config = resolvePlannerConfig({
      configsRoot,
      profileName: "wide",
      overrides: { gatewayMaxChildren: 2 },
    });
    expect(config.nodeThresholdKm).toBe(8);
    expect(config.gatewayMaxChildren).toBe(2);
  });

  it("rejects per-run overrides that fail validation", () => {
    expect(() =>
      resolvePlannerConfig({ configsRoot, overrides: { nodeThresholdKm: -1 } }),
    ).toThrow(InvalidConfigError);
  });
});
