/**
 * GeoJSON export for planned networks.
 *
 * Exports the gateway and nodes as Points and the tree as LineStrings, with
 * tree position and channels as feature properties. Useful for checking a
 * plan in QGIS, geojson.io, Mapbox, etc.
 */

import type { BoundingBox, Coordinate, PlanResult } from "../domain/index.js";
import { haversineDistanceKm } from "../geo/index.js";

/** GeoJSON types (subset we need) */
export interface PlanGeoJsonCollection {
  type: "FeatureCollection";
  bbox?: [number, number, number, number];
  features: PlanGeoJsonFeature[];
}

export interface PlanGeoJsonFeature {
  type: "Feature";
  geometry: GeoJsonPoint | GeoJsonLineString;
  properties: Record<string, unknown>;
}

interface GeoJsonPoint {
  type: "Point";
  coordinates: [number, number];
}

interface GeoJsonLineString {
  type: "LineString";
  coordinates: [number, number][];
}

/** Options for GeoJSON export */
export interface PlanGeoJsonOptions {
  /** Include nodes that could not be attached (default: true) */
  includeUnreachable?: boolean;
  /** Also emit feasible links the tree does not use (default: false) */
  includeFeasibleLinks?: boolean;
}

const toPosition = (c: Coordinate): [number, number] => [c.lng, c.lat];

function lineFeature(
  from: Coordinate,
  to: Coordinate,
  properties: Record<string, unknown>,
): PlanGeoJsonFeature {
  return {
    type: "Feature",
    geometry: { type: "LineString", coordinates: [toPosition(from), toPosition(to)] },
    properties,
  };
}

function boundsOf(coords: Coordinate[]): BoundingBox | null {
  if (coords.length === 0) return null;
  const bbox: BoundingBox = {
    minLat: Infinity,
    maxLat: -Infinity,
    minLng: Infinity,
    maxLng: -Infinity,
  };
  for (const c of coords) {
    bbox.minLat = Math.min(bbox.minLat, c.lat);
    bbox.maxLat = Math.max(bbox.maxLat, c.lat);
    bbox.minLng = Math.min(bbox.minLng, c.lng);
    bbox.maxLng = Math.max(bbox.maxLng, c.lng);
  }
  return bbox;
}

/**
 * Export a plan to a GeoJSON FeatureCollection.
 *
 * Feature order: gateway point, node points (node order), tree links
 * (node order, one per attached node), then unused feasible links.
 */
export function planToGeoJson(
  plan: PlanResult,
  options: PlanGeoJsonOptions = {},
): PlanGeoJsonCollection {
  const includeUnreachable = options.includeUnreachable ?? true;
  const features: PlanGeoJsonFeature[] = [];

  const coordinates = new Map<string, Coordinate>([
    [plan.gateway.id, plan.gateway.coordinate],
  ]);
  for (const node of plan.nodes) coordinates.set(node.id, node.coordinate);

  features.push({
    type: "Feature",
    geometry: { type: "Point", coordinates: toPosition(plan.gateway.coordinate) },
    properties: {
      id: plan.gateway.id,
      role: "gateway",
      downlinkFrequency: plan.gateway.downlinkFrequency,
      childCount: plan.gateway.childIds.length,
    },
  });

  const shown: Coordinate[] = [plan.gateway.coordinate];
  for (const node of plan.nodes) {
    if (!node.reachable && !includeUnreachable) continue;
    shown.push(node.coordinate);
    features.push({
      type: "Feature",
      geometry: { type: "Point", coordinates: toPosition(node.coordinate) },
      properties: {
        id: node.id,
        role: node.childIds.length > 0 ? "relay" : "leaf",
        reachable: node.reachable,
        gatewayEligible: node.gatewayEligible,
        parentId: node.parentId,
        childCount: node.childIds.length,
        uplinkFrequency: node.uplinkFrequency,
        downlinkFrequency: node.downlinkFrequency,
      },
    });
  }

  const treeLinks = new Set<string>();
  for (const node of plan.nodes) {
    if (node.parentId === null) continue;
    const parentCoord = coordinates.get(node.parentId);
    if (!parentCoord) continue;
    treeLinks.add([node.parentId, node.id].sort().join("|"));
    features.push(
      lineFeature(parentCoord, node.coordinate, {
        kind: "tree-link",
        parentId: node.parentId,
        childId: node.id,
        frequency: node.uplinkFrequency,
        distanceKm: Math.round(haversineDistanceKm(parentCoord, node.coordinate) * 1000) / 1000,
      }),
    );
  }

  if (options.includeFeasibleLinks) {
    for (const evaluation of plan.evaluations) {
      if (evaluation.status !== "available") continue;
      if (treeLinks.has([evaluation.from, evaluation.to].sort().join("|"))) continue;
      const from = coordinates.get(evaluation.from);
      const to = coordinates.get(evaluation.to);
      if (!from || !to) continue;
      features.push(
        lineFeature(from, to, {
          kind: "feasible-link",
          from: evaluation.from,
          to: evaluation.to,
          distanceKm: Math.round(evaluation.distanceKm * 1000) / 1000,
        }),
      );
    }
  }

  const collection: PlanGeoJsonCollection = { type: "FeatureCollection", features };
  const bounds = boundsOf(shown);
  if (bounds) {
    collection.bbox = [bounds.minLng, bounds.minLat, bounds.maxLng, bounds.maxLat];
  }
  return collection;
}
