import {
  STATS_API_VERSION,
  type AdvancedNetworkPolicyStats,
  type NetworkPolicyStats,
} from "@meshlens/types";

import { AdvancedPolicyFeature, NetworkPolicyStatsFeature, type FeatureGateSet } from "./features.js";
import { InMemoryStatsProvider, type StatsProvider } from "./provider.js";
import type { StatsSnapshot } from "./snapshot.js";
import { StatsREST, type ReadOnlyStore } from "./stats-rest.js";

export interface StatsProviders {
  networkPolicyStats: StatsProvider<NetworkPolicyStats>;
  advancedNetworkPolicyStats: StatsProvider<AdvancedNetworkPolicyStats>;
}

/** Stores keyed by the plural resource name used in request paths. */
export type StoreRegistry = ReadonlyMap<string, ReadOnlyStore>;

export function providersFromSnapshot(snapshot: StatsSnapshot): StatsProviders {
  return {
    networkPolicyStats: new InMemoryStatsProvider(snapshot.networkPolicyStats),
    advancedNetworkPolicyStats: new InMemoryStatsProvider(snapshot.advancedNetworkPolicyStats),
  };
}

export function createStatsRegistry(featureGates: FeatureGateSet, providers: StatsProviders): StoreRegistry {
  const networkPolicyStats = new StatsREST<NetworkPolicyStats>({
    resource: "networkpolicystats",
    kind: "NetworkPolicyStats",
    listKind: "NetworkPolicyStatsList",
    apiVersion: STATS_API_VERSION,
    requiredFeatures: [NetworkPolicyStatsFeature],
    featureGates,
    provider: providers.networkPolicyStats,
  });

  const advancedNetworkPolicyStats = new StatsREST<AdvancedNetworkPolicyStats>({
    resource: "advancednetworkpolicystats",
    kind: "AdvancedNetworkPolicyStats",
    listKind: "AdvancedNetworkPolicyStatsList",
    apiVersion: STATS_API_VERSION,
    requiredFeatures: [NetworkPolicyStatsFeature, AdvancedPolicyFeature],
    featureGates,
    provider: providers.advancedNetworkPolicyStats,
  });

  return new Map<string, ReadOnlyStore>([
    [networkPolicyStats.resource, networkPolicyStats],
    [advancedNetworkPolicyStats.resource, advancedNetworkPolicyStats],
  ]);
}
