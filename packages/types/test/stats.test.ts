import { describe, expect, it } from "vitest";

import {
  NetworkPolicyStatsListResource,
  isJsonValue,
  namespacedName,
  parseAdvancedNetworkPolicyStats,
  parseNetworkPolicyStats,
  parseObjectMeta,
  parseTrafficStats,
} from "../src/index.js";

describe("stats parsers", () => {
  it("defaults missing counters to zero", () => {
    expect(parseTrafficStats({ packets: 3 })).toEqual({ packets: 3, bytes: 0, sessions: 0 });
    expect(parseNetworkPolicyStats({ metadata: { namespace: "foo", name: "bar" } })).toEqual({
      metadata: { namespace: "foo", name: "bar" },
      trafficStats: { packets: 0, bytes: 0, sessions: 0 },
    });
  });

  it("rejects a record that declares another kind", () => {
    expect(parseNetworkPolicyStats({ kind: "AdvancedNetworkPolicyStats", metadata: { name: "bar" } })).toBeNull();
    expect(parseAdvancedNetworkPolicyStats({ kind: "NetworkPolicyStats", metadata: { name: "bar" } })).toBeNull();
    expect(parseAdvancedNetworkPolicyStats({ kind: "AdvancedNetworkPolicyStats", metadata: { name: "bar" } })?.kind).toBe(
      "AdvancedNetworkPolicyStats",
    );
  });

  it("rejects negative or fractional counters", () => {
    expect(parseTrafficStats({ packets: -1 })).toBeNull();
    expect(parseTrafficStats({ bytes: 1.5 })).toBeNull();
  });

  it("parses a stats list", () => {
    const list = NetworkPolicyStatsListResource.parse({
      kind: "NetworkPolicyStatsList",
      apiVersion: "stats.meshlens.io/v1alpha1",
      items: [{ metadata: { namespace: "foo", name: "bar" }, trafficStats: { packets: 1, bytes: 2, sessions: 3 } }],
    });

    expect(list?.kind).toBe("NetworkPolicyStatsList");
    expect(list?.items[0]?.trafficStats).toEqual({ packets: 1, bytes: 2, sessions: 3 });
  });
});

describe("metadata helpers", () => {
  it("keeps optional fields and skips null ones", () => {
    expect(
      parseObjectMeta({
        name: "bar",
        namespace: "foo",
        creationTimestamp: null,
        generation: 2,
        labels: { app: "web" },
      }),
    ).toEqual({ name: "bar", namespace: "foo", generation: 2, labels: { app: "web" } });
  });

  it("rejects labels with non-string values", () => {
    expect(parseObjectMeta({ name: "bar", labels: { replicas: 2 } })).toBeNull();
  });

  it("formats namespaced names", () => {
    expect(namespacedName({ namespace: "foo", name: "bar" })).toBe("foo/bar");
    expect(namespacedName({ name: "cluster-wide" })).toBe("cluster-wide");
  });

  it("rejects non-finite numbers as JSON", () => {
    expect(isJsonValue({ value: Number.NaN })).toBe(false);
    expect(isJsonValue({ nested: [1, "two", null] })).toBe(true);
  });
});
