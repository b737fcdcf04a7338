import { namespacedName, type ApiObject } from "@meshlens/types";

import { ProviderError } from "./errors.js";

/**
 * Read-only source of stats records. Implementations must be safe for
 * concurrent reads and must never hold two records with the same
 * namespace/name key.
 */
export interface StatsProvider<T> {
  /** Records of `namespace`, or of every namespace when it is empty. */
  listStats(namespace: string): T[];
  getStats(namespace: string, name: string): T | undefined;
}

export class InMemoryStatsProvider<T extends ApiObject> implements StatsProvider<T> {
  private readonly index = new Map<string, Map<string, T>>();

  constructor(records: Iterable<T> = []) {
    for (const record of records) {
      this.insert(record);
    }
  }

  get size(): number {
    let total = 0;
    for (const byName of this.index.values()) {
      total += byName.size;
    }
    return total;
  }

  listStats(namespace: string): T[] {
    if (namespace.length === 0) {
      const all: T[] = [];
      for (const byName of this.index.values()) {
        all.push(...byName.values());
      }
      return all;
    }

    const byName = this.index.get(namespace);
    return byName === undefined ? [] : [...byName.values()];
  }

  getStats(namespace: string, name: string): T | undefined {
    return this.index.get(namespace)?.get(name);
  }

  private insert(record: T): void {
    const namespace = record.metadata.namespace ?? "";
    const name = record.metadata.name;

    let byName = this.index.get(namespace);
    if (byName === undefined) {
      byName = new Map();
      this.index.set(namespace, byName);
    }

    if (byName.has(name)) {
      throw new ProviderError(`duplicate stats record ${namespacedName(record.metadata)}`);
    }

    byName.set(name, record);
  }
}
