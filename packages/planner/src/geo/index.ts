export { haversineDistanceKm, EARTH_RADIUS_KM } from "./haversine.js";
