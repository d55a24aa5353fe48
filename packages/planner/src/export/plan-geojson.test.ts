import { describe, it, expect } from "vitest";
import { planToGeoJson } from "./plan-geojson.js";
import { NetworkState } from "../state/index.js";
import { getDefaultPlannerConfig } from "../config/index.js";
import type { PlanResult } from "../domain/index.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** gateway -> A -> {B, C}; "far" is unreachable */
function makePlan(): PlanResult {
  const state = new NetworkState();
  state.setGateway({ lat: 0, lng: 0 });
  state.upsertNode({ id: "A", coordinate: { lat: 0.01, lng: 0 }, gatewayEligible: true });
  state.upsertNode({ id: "B", coordinate: { lat: 0.02, lng: 0 }, gatewayEligible: false });
  state.upsertNode({ id: "C", coordinate: { lat: 0.03, lng: 0 }, gatewayEligible: false });
  state.upsertNode({ id: "far", coordinate: { lat: 1, lng: 0 }, gatewayEligible: false });
  return state.plan(getDefaultPlannerConfig());
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("planToGeoJson", () => {
  it("emits the gateway, every node and every tree link", () => {
    const collection = planToGeoJson(makePlan());

    expect(collection.type).toBe("FeatureCollection");
    expect(collection.features.map((f) => f.geometry.type)).toEqual([
      "Point",
      "Point",
      "Point",
      "Point",
      "Point",
      "LineString",
      "LineString",
      "LineString",
    ]);
    expect(collection.bbox).toEqual([0, 0, 0, 1]);
  });

  it("puts coordinates in [lng, lat] order", () => {
    const collection = planToGeoJson(makePlan());
    expect(collection.features[1]?.geometry).toEqual({
      type: "Point",
      coordinates: [0, 0.01],
    });
  });

  it("describes gateway and node roles", () => {
    const collection = planToGeoJson(makePlan());
    expect(collection.features[0]?.properties).toEqual({
      id: "gateway",
      role: "gateway",
      downlinkFrequency: 3,
      childCount: 1,
    });
    expect(collection.features[1]?.properties).toMatchObject({
      id: "A",
      role: "relay",
      reachable: true,
      uplinkFrequency: 3,
      downlinkFrequency: 16,
    });
    expect(collection.features[4]?.properties).toMatchObject({
      id: "far",
      role: "leaf",
      reachable: false,
      parentId: null,
    });
  });

  it("labels tree links with the channel they use", () => {
    const collection = planToGeoJson(makePlan());
    expect(collection.features[5]?.properties).toEqual({
      kind: "tree-link",
      parentId: "gateway",
      childId: "A",
      frequency: 3,
      distanceKm: 1.112,
    });
    expect(collection.features[6]?.properties).toMatchObject({
      parentId: "A",
      childId: "B",
      frequency: 16,
    });
  });

  it("can omit unreachable nodes", () => {
    const collection = planToGeoJson(makePlan(), { includeUnreachable: false });
    const ids = collection.features.map((f) => f.properties["id"]).filter(Boolean);
    expect(ids).toEqual(["gateway", "A", "B", "C"]);
    expect(collection.bbox).toEqual([0, 0, 0, 0.03]);
  });

  it("can include feasible links the tree does not use", () => {
    const collection = planToGeoJson(makePlan(), { includeFeasibleLinks: true });
    const feasible = collection.features.filter((f) => f.properties["kind"] === "feasible-link");
    expect(feasible.map((f) => [f.properties["from"], f.properties["to"]])).toEqual([["B", "C"]]);
  });
});
