import { ConfigError } from "./errors.js";

export type FeatureStage = "alpha" | "beta" | "ga";

export interface FeatureSpec {
  default: boolean;
  stage: FeatureStage;
  description: string;
}

/** Collects traffic counters for network policies and serves them. */
export const NetworkPolicyStatsFeature = "NetworkPolicyStats";

/** Enables the advanced (tiered, cluster-scoped) policy engine. */
export const AdvancedPolicyFeature = "AdvancedPolicy";

export const DEFAULT_FEATURE_SPECS: Readonly<Record<string, FeatureSpec>> = {
  [NetworkPolicyStatsFeature]: {
    default: false,
    stage: "alpha",
    description: "Serve per-policy traffic statistics",
  },
  [AdvancedPolicyFeature]: {
    default: false,
    stage: "alpha",
    description: "Enable the advanced network policy engine",
  },
};

/**
 * Read-only view of which optional capabilities are active. Built once from
 * startup configuration and injected into every component that needs it.
 */
export class FeatureGateSet {
  private readonly specs: Readonly<Record<string, FeatureSpec>>;
  private readonly overrides: ReadonlyMap<string, boolean>;

  constructor(
    overrides: Readonly<Record<string, boolean>> = {},
    specs: Readonly<Record<string, FeatureSpec>> = DEFAULT_FEATURE_SPECS,
  ) {
    for (const name of Object.keys(overrides)) {
      if (!Object.hasOwn(specs, name)) {
        throw new ConfigError(`unrecognized feature gate: ${name}`);
      }
    }

    this.specs = specs;
    this.overrides = new Map(Object.entries(overrides));
  }

  static fromString(value: string, specs: Readonly<Record<string, FeatureSpec>> = DEFAULT_FEATURE_SPECS): FeatureGateSet {
    return new FeatureGateSet(parseFeatureGates(value), specs);
  }

  isEnabled(name: string): boolean {
    const override = this.overrides.get(name);
    if (override !== undefined) {
      return override;
    }

    if (!Object.hasOwn(this.specs, name)) {
      return false;
    }
    return this.specs[name]?.default ?? false;
  }

  knownFeatures(): string[] {
    return Object.keys(this.specs).sort();
  }

  enabledFeatures(): string[] {
    return this.knownFeatures().filter((name) => this.isEnabled(name));
  }

  /** Returns the first of `names` that is disabled, if any. */
  firstDisabled(names: readonly string[]): string | undefined {
    return names.find((name) => !this.isEnabled(name));
  }

  toString(): string {
    return this.knownFeatures()
      .map((name) => `${name}=${String(this.isEnabled(name))}`)
      .join(",");
  }
}

/**
 * Parses the `Name=true,Other=false` form accepted by --feature-gates.
 * Whitespace around entries is ignored; an empty string yields no overrides.
 */
export function parseFeatureGates(value: string): Record<string, boolean> {
  const gates = new Map<string, boolean>();

  for (const rawEntry of value.split(",")) {
    const entry = rawEntry.trim();
    if (entry.length === 0) {
      continue;
    }

    const separator = entry.indexOf("=");
    if (separator <= 0) {
      throw new ConfigError(`missing bool value for feature gate: ${entry}`);
    }

    const name = entry.slice(0, separator).trim();
    const rawValue = entry.slice(separator + 1).trim().toLowerCase();
    if (rawValue !== "true" && rawValue !== "false") {
      throw new ConfigError(`invalid value of ${name}=${rawValue}, expected true or false`);
    }

    gates.set(name, rawValue === "true");
  }

  // fromEntries keeps names such as __proto__ as own keys
  return Object.fromEntries(gates);
}
