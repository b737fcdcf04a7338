import { readFile } from "node:fs/promises";

import {
  isPlainObject,
  parseAdvancedNetworkPolicyStats,
  parseNetworkPolicyStats,
  type AdvancedNetworkPolicyStats,
  type NetworkPolicyStats,
} from "@meshlens/types";
import YAML from "yaml";

import { ProviderError } from "./errors.js";

/**
 * Stats records served by the apiserver, as read from a snapshot file.
 */
export interface StatsSnapshot {
  networkPolicyStats: NetworkPolicyStats[];
  advancedNetworkPolicyStats: AdvancedNetworkPolicyStats[];
}

export function emptySnapshot(): StatsSnapshot {
  return { networkPolicyStats: [], advancedNetworkPolicyStats: [] };
}

function parseRecords<T>(
  value: unknown,
  field: string,
  kind: string,
  parseRecord: (entry: unknown) => T | null,
): T[] {
  if (value === undefined || value === null) {
    return [];
  }

  if (!Array.isArray(value)) {
    throw new ProviderError(`snapshot field ${field} must be a list`);
  }

  return value.map((entry, index) => {
    if (isPlainObject(entry) && typeof entry.kind === "string" && entry.kind !== kind) {
      throw new ProviderError(`snapshot field ${field}[${index}] has kind ${entry.kind}, expected ${kind}`);
    }

    const record = parseRecord(entry);
    if (record === null) {
      throw new ProviderError(`snapshot field ${field}[${index}] is not a valid stats record`);
    }
    return record;
  });
}

export function parseStatsSnapshot(value: unknown): StatsSnapshot {
  if (value === null || value === undefined) {
    return emptySnapshot();
  }

  if (!isPlainObject(value)) {
    throw new ProviderError("stats snapshot must be a mapping");
  }

  return {
    networkPolicyStats: parseRecords(
      value.networkPolicyStats,
      "networkPolicyStats",
      "NetworkPolicyStats",
      parseNetworkPolicyStats,
    ),
    advancedNetworkPolicyStats: parseRecords(
      value.advancedNetworkPolicyStats,
      "advancedNetworkPolicyStats",
      "AdvancedNetworkPolicyStats",
      parseAdvancedNetworkPolicyStats,
    ),
  };
}

/** Reads a YAML (or JSON) snapshot file. */
export async function loadStatsSnapshot(filePath: string): Promise<StatsSnapshot> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ProviderError(`unable to read stats snapshot ${filePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw new ProviderError(`stats snapshot ${filePath} is not valid YAML`, { cause: error });
  }

  return parseStatsSnapshot(parsed);
}
