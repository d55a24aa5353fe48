/**
 * Planner configuration.
 */

/** What to do when the frequency pool runs dry */
export type ExhaustionPolicy = "fail" | "skip";

/** Inclusive range of integer channel ids */
export interface FrequencyRange {
  start: number;
  end: number;
}

export interface PlannerConfig {
  /** Max gateway-to-node distance, inclusive */
  gatewayThresholdKm: number;
  /** Max node-to-node distance, exclusive */
  nodeThresholdKm: number;
  /** Fan-out cap for every relay node */
  maxChildrenPerNode: number;
  /** Fan-out cap for the gateway; null means unlimited */
  gatewayMaxChildren: number | null;
  /** Channels available to relay downlinks */
  frequencyPoolRange: FrequencyRange;
  /** Gateway downlink channel (0-7), never drawn from the pool */
  gatewayDownlinkFrequency: number;
  onExhaustion: ExhaustionPolicy;
}

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

/** Partial config as accepted from profiles and request bodies */
export type PlannerConfigOverrides = DeepPartial<PlannerConfig>;
