/**
 * Frequency assignment module.
 *
 * NetworkTree + channel pool -> uplink/downlink per node
 */

export {
  assignFrequencies,
  buildFrequencyPool,
  throwIfExhausted,
  DEFAULT_FREQUENCY_RANGE,
  DEFAULT_GATEWAY_DOWNLINK,
  type FrequencyAssignerOptions,
} from "./frequency-assigner.js";
