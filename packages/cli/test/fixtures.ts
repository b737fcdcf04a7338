import type { JsonObject } from "@meshlens/types";

export function pod(namespace: string, name: string, ips: string[] = []): JsonObject {
  return { pod: { namespace, name }, ips };
}

export function appliedToGroup(name: string, members: JsonObject[]): JsonObject {
  return {
    kind: "AppliedToGroup",
    apiVersion: "controlplane.meshlens.io/v1beta2",
    metadata: { name },
    groupMembers: members,
  };
}

export function addressGroup(name: string, members: JsonObject[]): JsonObject {
  return {
    kind: "AddressGroup",
    apiVersion: "controlplane.meshlens.io/v1beta2",
    metadata: { name },
    groupMembers: members,
  };
}

export function list(kind: string, items: JsonObject[]): JsonObject {
  return { kind, apiVersion: "controlplane.meshlens.io/v1beta2", metadata: {}, items };
}

export function statsRecord(namespace: string, name: string, sessions: number): JsonObject {
  return {
    metadata: { namespace, name, creationTimestamp: "2024-05-01T10:00:00Z" },
    trafficStats: { packets: sessions * 10, bytes: sessions * 1000, sessions },
  };
}
