import {
  AdvancedNetworkPolicyStatsListResource,
  AdvancedNetworkPolicyStatsResource,
  NetworkPolicyStatsListResource,
  NetworkPolicyStatsResource,
  type ApiList,
  type StatsRecord,
} from "@meshlens/types";

import { NONE_PLACEHOLDER, type TableOutput } from "./common.js";
import { genericFactory } from "./dispatcher.js";

/** Display form shared by both stats kinds. */
export class StatsResponse implements TableOutput {
  constructor(
    readonly namespace: string,
    readonly name: string,
    readonly sessions: number,
    readonly packets: number,
    readonly bytes: number,
    readonly createdAt: string,
  ) {}

  getTableHeader(): string[] {
    return ["NAMESPACE", "NAME", "SESSIONS", "PACKETS", "BYTES", "CREATED AT"];
  }

  getTableRow(_maxColumnLength: number): string[] {
    return [
      this.namespace.length === 0 ? NONE_PLACEHOLDER : this.namespace,
      this.name,
      String(this.sessions),
      String(this.packets),
      String(this.bytes),
      this.createdAt.length === 0 ? NONE_PLACEHOLDER : this.createdAt,
    ];
  }

  sortRows(): boolean {
    return true;
  }
}

export function objectTransform(record: StatsRecord): StatsResponse {
  const { metadata, trafficStats } = record;
  return new StatsResponse(
    metadata.namespace ?? "",
    metadata.name,
    trafficStats.sessions,
    trafficStats.packets,
    trafficStats.bytes,
    metadata.creationTimestamp ?? "",
  );
}

export function listTransform(list: ApiList<StatsRecord>): StatsResponse[] {
  return list.items.map(objectTransform);
}

export const transformNetworkPolicyStats = genericFactory(
  NetworkPolicyStatsResource,
  NetworkPolicyStatsListResource,
  objectTransform,
  listTransform,
);

export const transformAdvancedNetworkPolicyStats = genericFactory(
  AdvancedNetworkPolicyStatsResource,
  AdvancedNetworkPolicyStatsListResource,
  objectTransform,
  listTransform,
);
