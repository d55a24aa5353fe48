export { planNetwork, evaluateSingleNodeEligibility } from "./plan-network.js";
