import { isNonNegativeInteger, isPlainObject } from "./json.js";
import {
  defineResourceType,
  parseApiList,
  parseObjectMeta,
  parseTypeMeta,
  type ApiList,
  type ApiObject,
  type ResourceType,
} from "./meta.js";

export const STATS_API_GROUP = "stats.meshlens.io";
export const STATS_API_VERSION = `${STATS_API_GROUP}/v1alpha1`;

export interface TrafficStats {
  packets: number;
  bytes: number;
  sessions: number;
}

/** Traffic counters of one Kubernetes NetworkPolicy. */
export interface NetworkPolicyStats extends ApiObject {
  trafficStats: TrafficStats;
}

export type NetworkPolicyStatsList = ApiList<NetworkPolicyStats>;

/** Traffic counters of one policy of the advanced policy engine. */
export interface AdvancedNetworkPolicyStats extends ApiObject {
  trafficStats: TrafficStats;
}

export type AdvancedNetworkPolicyStatsList = ApiList<AdvancedNetworkPolicyStats>;

export type StatsRecord = NetworkPolicyStats | AdvancedNetworkPolicyStats;

export function parseTrafficStats(value: unknown): TrafficStats | null {
  if (!isPlainObject(value)) {
    return null;
  }

  const { packets = 0, bytes = 0, sessions = 0 } = value;
  if (!isNonNegativeInteger(packets) || !isNonNegativeInteger(bytes) || !isNonNegativeInteger(sessions)) {
    return null;
  }

  return { packets, bytes, sessions };
}

/** Rejects a record whose declared kind is not `kind`. */
function parseStatsObject(value: unknown, kind: string): StatsRecord | null {
  if (!isPlainObject(value)) {
    return null;
  }

  const typeMeta = parseTypeMeta(value);
  const metadata = parseObjectMeta(value.metadata);
  if (typeMeta === null || metadata === null) {
    return null;
  }
  if (typeMeta.kind !== undefined && typeMeta.kind !== kind) {
    return null;
  }

  const trafficStats = value.trafficStats === undefined ? { packets: 0, bytes: 0, sessions: 0 } : parseTrafficStats(value.trafficStats);
  if (trafficStats === null) {
    return null;
  }

  return { ...typeMeta, metadata, trafficStats };
}

export function parseNetworkPolicyStats(value: unknown): NetworkPolicyStats | null {
  return parseStatsObject(value, "NetworkPolicyStats");
}

export function parseAdvancedNetworkPolicyStats(value: unknown): AdvancedNetworkPolicyStats | null {
  return parseStatsObject(value, "AdvancedNetworkPolicyStats");
}

export const NetworkPolicyStatsResource: ResourceType<NetworkPolicyStats> = defineResourceType(
  "NetworkPolicyStats",
  parseNetworkPolicyStats,
);

export const NetworkPolicyStatsListResource: ResourceType<NetworkPolicyStatsList> = defineResourceType(
  "NetworkPolicyStatsList",
  (value) => parseApiList(value, "NetworkPolicyStats", parseNetworkPolicyStats),
);

export const AdvancedNetworkPolicyStatsResource: ResourceType<AdvancedNetworkPolicyStats> = defineResourceType(
  "AdvancedNetworkPolicyStats",
  parseAdvancedNetworkPolicyStats,
);

export const AdvancedNetworkPolicyStatsListResource: ResourceType<AdvancedNetworkPolicyStatsList> = defineResourceType(
  "AdvancedNetworkPolicyStatsList",
  (value) => parseApiList(value, "AdvancedNetworkPolicyStats", parseAdvancedNetworkPolicyStats),
);
