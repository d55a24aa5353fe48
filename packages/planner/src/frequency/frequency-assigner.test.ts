import { describe, it, expect } from "vitest";
import {
  assignFrequencies,
  buildFrequencyPool,
  throwIfExhausted,
} from "./frequency-assigner.js";
import { buildNetworkTree } from "../tree/index.js";
import { FrequencyExhaustedError } from "../domain/index.js";
import type { FeasibilityGraph, NetworkTree } from "../domain/index.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Tree from parent -> children lists (built through the tree builder) */
function makeTree(children: Record<string, string[]>): NetworkTree {
  const graph: FeasibilityGraph = new Map([["gateway", []]]);
  const ids: string[] = [];
  for (const [parent, kids] of Object.entries(children)) {
    for (const kid of kids) {
      ids.push(kid);
      if (!graph.has(parent)) graph.set(parent, []);
      graph.get(parent)?.push(kid);
      graph.set(kid, [...(graph.get(kid) ?? []), parent]);
    }
  }
  return buildNetworkTree(graph, ids, { maxChildrenPerNode: 10, gatewayMaxChildren: null });
}

/** gateway -> N1 -> N2 -> ... -> Nn */
function chain(length: number): NetworkTree {
  const children: Record<string, string[]> = { gateway: ["N1"] };
  for (let i = 1; i < length; i++) children[`N${i}`] = [`N${i + 1}`];
  return makeTree(children);
}

const DEFAULTS = {
  pool: buildFrequencyPool({ start: 16, end: 30 }),
  gatewayDownlinkFrequency: 3,
  onExhaustion: "fail" as const,
};

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("buildFrequencyPool", () => {
  it("expands an inclusive range", () => {
    expect(buildFrequencyPool({ start: 16, end: 20 })).toEqual([16, 17, 18, 19, 20]);
  });

  it("yields a single channel for a one-value range", () => {
    expect(buildFrequencyPool({ start: 16, end: 16 })).toEqual([16]);
  });

  it("yields nothing for an inverted range", () => {
    expect(buildFrequencyPool({ start: 20, end: 16 })).toEqual([]);
  });
});

describe("assignFrequencies", () => {
  it("allocates downlinks down a chain from the front of the pool", () => {
    const result = assignFrequencies(chain(5), DEFAULTS);

    expect(result.gatewayDownlink).toBe(3);
    expect([...result.downlink.entries()]).toEqual([
      ["N1", 16],
      ["N2", 17],
      ["N3", 18],
      ["N4", 19],
    ]);
    expect([...result.uplink.entries()]).toEqual([
      ["N1", 3],
      ["N2", 16],
      ["N3", 17],
      ["N4", 18],
      ["N5", 19],
    ]);
    expect(result.outcome).toEqual({ status: "success" });
  });

  it("gives leaves no downlink", () => {
    const result = assignFrequencies(
      makeTree({ gateway: ["A", "B"], A: ["C"] }),
      DEFAULTS,
    );
    expect(result.downlink.get("A")).toBe(16);
    expect(result.downlink.has("B")).toBe(false);
    expect(result.downlink.has("C")).toBe(false);
    expect(result.uplink.get("B")).toBe(3);
    expect(result.uplink.get("C")).toBe(16);
  });

  it("allocates in breadth-first order", () => {
    const result = assignFrequencies(
      makeTree({ gateway: ["A", "B"], A: ["C"], B: ["D"], C: ["E"] }),
      DEFAULTS,
    );
    expect([...result.downlink.entries()]).toEqual([
      ["A", 16],
      ["B", 17],
      ["C", 18],
    ]);
  });

  it("never hands the same downlink to two nodes", () => {
    const result = assignFrequencies(
      makeTree({
        gateway: ["A", "B", "C"],
        A: ["A1", "A2"],
        B: ["B1", "B2"],
        C: ["C1", "C2"],
        A1: ["A1x"],
        B2: ["B2x"],
      }),
      DEFAULTS,
    );
    const channels = [...result.downlink.values()];
    expect(new Set(channels).size).toBe(channels.length);
    expect(channels).not.toContain(3);
  });

  it("sets every uplink to the parent's downlink", () => {
    const tree = makeTree({ gateway: ["A", "B"], A: ["C", "D"], D: ["E"] });
    const result = assignFrequencies(tree, DEFAULTS);
    for (const [id, link] of tree.links) {
      if (link.parentId === null) continue;
      const parentDownlink =
        link.parentId === "gateway" ? result.gatewayDownlink : result.downlink.get(link.parentId);
      expect(result.uplink.get(id)).toBe(parentDownlink);
    }
  });

  it("does not consume the caller's pool", () => {
    const pool = [16, 17];
    assignFrequencies(chain(3), { ...DEFAULTS, pool });
    expect(pool).toEqual([16, 17]);
  });

  it("handles a tree with no attached nodes", () => {
    const result = assignFrequencies(makeTree({}), DEFAULTS);
    expect(result.uplink.size).toBe(0);
    expect(result.downlink.size).toBe(0);
    expect(result.outcome).toEqual({ status: "success" });
  });

  describe("when the pool runs out", () => {
    it("stops at the node that could not be served by default", () => {
      const result = assignFrequencies(chain(3), { ...DEFAULTS, pool: [16] });

      expect(result.outcome).toEqual({
        status: "exhausted",
        policy: "fail",
        nodeId: "N2",
        skippedIds: ["N2"],
        unassignedCount: 2,
      });
      expect(result.downlink.get("N1")).toBe(16);
      expect(result.uplink.get("N2")).toBe(16);
      expect(result.uplink.has("N3")).toBe(false);
    });

    it("keeps walking under the skip policy", () => {
      const result = assignFrequencies(chain(4), {
        ...DEFAULTS,
        pool: [16],
        onExhaustion: "skip",
      });

      expect(result.outcome).toEqual({
        status: "exhausted",
        policy: "skip",
        nodeId: "N2",
        skippedIds: ["N2", "N3"],
        unassignedCount: 3,
      });
      expect(result.uplink.has("N3")).toBe(false);
      expect(result.uplink.has("N4")).toBe(false);
    });

    it("still serves other branches under the skip policy", () => {
      const result = assignFrequencies(
        makeTree({ gateway: ["A", "B"], A: ["A1"], B: ["B1"] }),
        { ...DEFAULTS, pool: [16], onExhaustion: "skip" },
      );
      expect(result.downlink.get("A")).toBe(16);
      expect(result.downlink.has("B")).toBe(false);
      expect(result.uplink.get("B")).toBe(3);
      expect(result.uplink.get("A1")).toBe(16);
      expect(result.uplink.has("B1")).toBe(false);
    });
  });
});

describe("throwIfExhausted", () => {
  it("throws FrequencyExhaustedError naming the node", () => {
    const { outcome } = assignFrequencies(chain(3), { ...DEFAULTS, pool: [16] });
    expect(() => throwIfExhausted(outcome)).toThrow(FrequencyExhaustedError);
    try {
      throwIfExhausted(outcome);
    } catch (err) {
      expect(err).toMatchObject({ code: "frequency-exhausted", nodeId: "N2", unassignedCount: 2 });
    }
  });

  it("does nothing on success", () => {
    expect(() => throwIfExhausted({ status: "success" })).not.toThrow();
  });
});
