import { ConfigError } from "./errors.js";
import { FeatureGateSet } from "./features.js";

export const DEFAULT_API_HOST = "127.0.0.1";
export const DEFAULT_API_PORT = 10349;

export interface ResolveServerConfigOptions {
  host?: string;
  port?: number | string;
  /** `Name=true,Other=false` */
  featureGates?: string;
  statsFile?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedServerConfig {
  host: string;
  port: number;
  featureGates: FeatureGateSet;
  statsFile?: string;
}

/**
 * Explicit options win over MESHLENS_* environment variables, which win
 * over the defaults.
 */
export function resolveServerConfig(options: ResolveServerConfigOptions = {}): ResolvedServerConfig {
  const env = options.env ?? process.env;

  const host = firstNonEmptyString([options.host, env.MESHLENS_API_HOST]) ?? DEFAULT_API_HOST;
  const port = parsePort(options.port ?? firstNonEmptyString([env.MESHLENS_API_PORT]) ?? DEFAULT_API_PORT);
  const featureGates = FeatureGateSet.fromString(
    firstNonEmptyString([options.featureGates, env.MESHLENS_FEATURE_GATES]) ?? "",
  );
  const statsFile = firstNonEmptyString([options.statsFile, env.MESHLENS_STATS_FILE]);

  return {
    host,
    port,
    featureGates,
    statsFile,
  };
}

export function parsePort(value: number | string): number {
  const port = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`invalid port: ${String(value)}`);
  }

  return port;
}

function firstNonEmptyString(values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
  }

  return undefined;
}
