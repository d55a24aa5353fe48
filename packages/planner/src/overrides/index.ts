export {
  ConnectionOverrideStore,
  canonicalPair,
  type FailedConnectionLookup,
} from "./connection-overrides.js";
