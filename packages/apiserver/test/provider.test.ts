import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import type { NetworkPolicyStats } from "@meshlens/types";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ProviderError } from "../src/errors.js";
import { InMemoryStatsProvider } from "../src/provider.js";
import { loadStatsSnapshot, parseStatsSnapshot } from "../src/snapshot.js";

function stats(namespace: string, name: string, packets = 0): NetworkPolicyStats {
  return { metadata: { namespace, name }, trafficStats: { packets, bytes: 0, sessions: 0 } };
}

describe("InMemoryStatsProvider", () => {
  it("indexes records by namespace and name", () => {
    const provider = new InMemoryStatsProvider([stats("foo", "bar"), stats("foo", "baz"), stats("foo1", "bar1")]);

    expect(provider.size).toBe(3);
    expect(provider.getStats("foo", "baz")).toEqual(stats("foo", "baz"));
    expect(provider.getStats("foo1", "baz")).toBeUndefined();
    expect(provider.listStats("foo").map((item) => item.metadata.name)).toEqual(["bar", "baz"]);
    expect(provider.listStats("")).toHaveLength(3);
    expect(provider.listStats("missing")).toEqual([]);
  });

  it("rejects duplicate keys", () => {
    expect(() => new InMemoryStatsProvider([stats("foo", "bar"), stats("foo", "bar", 1)])).toThrowError(
      "duplicate stats record foo/bar",
    );
    expect(() => new InMemoryStatsProvider([stats("", "cluster-wide"), stats("", "cluster-wide")])).toThrowError(
      "duplicate stats record cluster-wide",
    );
  });
});

describe("stats snapshot", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), "meshlens-snapshot-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("loads a YAML snapshot", async () => {
    const filePath = path.join(tempDir, "stats.yaml");
    await writeFile(
      filePath,
      [
        "networkPolicyStats:",
        "  - metadata: { namespace: foo, name: bar }",
        "    trafficStats: { packets: 4, bytes: 400, sessions: 2 }",
        "advancedNetworkPolicyStats: []",
        "",
      ].join("\n"),
      "utf8",
    );

    const snapshot = await loadStatsSnapshot(filePath);

    expect(snapshot.networkPolicyStats).toEqual([
      { metadata: { namespace: "foo", name: "bar" }, trafficStats: { packets: 4, bytes: 400, sessions: 2 } },
    ]);
    expect(snapshot.advancedNetworkPolicyStats).toEqual([]);
  });

  it("reports a missing file as a provider error", async () => {
    await expect(loadStatsSnapshot(path.join(tempDir, "absent.yaml"))).rejects.toBeInstanceOf(ProviderError);
  });

  it("rejects invalid records with their position", () => {
    expect(() => parseStatsSnapshot({ networkPolicyStats: [{ metadata: { name: "ok" } }, { metadata: {} }] })).toThrowError(
      "snapshot field networkPolicyStats[1] is not a valid stats record",
    );
  });

  it("rejects records filed under the other stats kind", () => {
    expect(() =>
      parseStatsSnapshot({
        advancedNetworkPolicyStats: [{ kind: "NetworkPolicyStats", metadata: { namespace: "foo", name: "bar" } }],
      }),
    ).toThrowError("snapshot field advancedNetworkPolicyStats[0] has kind NetworkPolicyStats, expected AdvancedNetworkPolicyStats");
    expect(() =>
      parseStatsSnapshot({
        networkPolicyStats: [
          { metadata: { namespace: "foo", name: "bar" } },
          { kind: "AdvancedNetworkPolicyStats", metadata: { namespace: "foo", name: "baz" } },
        ],
      }),
    ).toThrowError(ProviderError);
  });

  it("accepts records that declare their own kind", () => {
    const snapshot = parseStatsSnapshot({
      advancedNetworkPolicyStats: [{ kind: "AdvancedNetworkPolicyStats", metadata: { namespace: "foo", name: "bar" } }],
    });

    expect(snapshot.advancedNetworkPolicyStats[0]?.kind).toBe("AdvancedNetworkPolicyStats");
  });

  it("treats an empty document as an empty snapshot", () => {
    expect(parseStatsSnapshot(null)).toEqual({ networkPolicyStats: [], advancedNetworkPolicyStats: [] });
  });
});
