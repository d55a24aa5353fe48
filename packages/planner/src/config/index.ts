export {
  getDefaultPlannerConfig,
  mergePlannerConfig,
  diffPlannerConfig,
  parseConfigOverrides,
  validatePlannerConfig,
  findConfigsRoot,
  loadBaseConfig,
  loadProfileConfig,
  listProfiles,
  resolvePlannerConfig,
  saveProfileConfig,
  GATEWAY_FREQUENCY_MAX,
  type ProfileConfig,
  type ProfileInfo,
  type ResolveConfigOptions,
} from "./planner-config.js";
