/**
 * Geographic types shared by distance checks and map export.
 */

/** Geographic coordinate (WGS84, degrees) */
export interface Coordinate {
  lat: number;
  lng: number;
}

/** Axis-aligned bounding box in WGS84 coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}
