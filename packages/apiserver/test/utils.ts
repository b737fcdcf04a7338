import type { AdvancedNetworkPolicyStats, NetworkPolicyStats } from "@meshlens/types";

import { FeatureGateSet } from "../src/features.js";
import { createApiNodeServer } from "../src/server.js";
import { createStatsRegistry, providersFromSnapshot } from "../src/stats-registry.js";

export interface TestApiServer {
  url: string;
  close: () => Promise<void>;
}

export interface StartTestApiServerOptions {
  featureGates?: string;
  networkPolicyStats?: NetworkPolicyStats[];
  advancedNetworkPolicyStats?: AdvancedNetworkPolicyStats[];
  version?: string;
}

export function trafficRecord(namespace: string, name: string, sessions = 1): AdvancedNetworkPolicyStats {
  return {
    metadata: { namespace, name },
    trafficStats: { packets: sessions * 10, bytes: sessions * 1000, sessions },
  };
}

export async function startTestApiServer(options: StartTestApiServerOptions = {}): Promise<TestApiServer> {
  const featureGates = FeatureGateSet.fromString(options.featureGates ?? "NetworkPolicyStats=true,AdvancedPolicy=true");
  const providers = providersFromSnapshot({
    networkPolicyStats: options.networkPolicyStats ?? [],
    advancedNetworkPolicyStats: options.advancedNetworkPolicyStats ?? [],
  });
  const server = createApiNodeServer({
    stores: createStatsRegistry(featureGates, providers),
    version: options.version,
  });

  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", resolve);
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Unable to resolve apiserver address");
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error === undefined) {
            resolve();
            return;
          }

          reject(error);
        });
      });
    },
  };
}
