export { NetworkState, type NetworkRepository, type NodeInput } from "./network-state.js";
