export {
  generateConfigurationCommands,
  formatConfigurationCommand,
} from "./config-commands.js";
export {
  planToGeoJson,
  type PlanGeoJsonOptions,
  type PlanGeoJsonCollection,
  type PlanGeoJsonFeature,
} from "./plan-geojson.js";
