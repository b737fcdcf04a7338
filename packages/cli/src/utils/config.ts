/**
 * Configuration for mlctl
 *
 * Loads ~/.mlctlrc and the nearest project .mlctlrc (YAML or JSON), then
 * applies MESHLENS_* environment variables.
 */
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";

import { DEFAULT_API_HOST, DEFAULT_API_PORT } from "@meshlens/apiserver";
import { isPlainObject } from "@meshlens/types";
import YAML from "yaml";

import { configError } from "../errors.js";
import { isOutputFormat, type OutputFormat } from "../types.js";

export interface MlctlConfig {
  /** Base URL of the stats apiserver */
  server?: string;
  output?: OutputFormat;
  /** Width budget of summarized table cells */
  maxColumnWidth?: number;
  /** `Name=true,Other=false`, used by `mlctl serve` */
  featureGates?: string;
  /** Snapshot served by `mlctl serve` */
  statsFile?: string;
  color?: boolean;
}

export const DEFAULT_CONFIG: Readonly<MlctlConfig> = {
  server: `http://${DEFAULT_API_HOST}:${DEFAULT_API_PORT}`,
  output: "table",
  maxColumnWidth: 62,
  color: true,
};

export const CONFIG_FILE_NAME = ".mlctlrc";

export function getGlobalConfigPath(homeDir: string = homedir()): string {
  return join(homeDir, CONFIG_FILE_NAME);
}

/** Searches from `startDir` upward for a .mlctlrc. */
export function getProjectConfigPath(startDir?: string): string | undefined {
  let currentDir = resolve(startDir ?? process.cwd());

  for (;;) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

export function parseMaxColumnWidth(value: unknown, source: string): number {
  const width = typeof value === "string" && value.trim().length > 0 ? Number(value) : value;
  if (typeof width !== "number" || !Number.isInteger(width) || width < 0) {
    throw configError(`${source}: maxColumnWidth must be a non-negative integer`);
  }

  return width;
}

/**
 * Validates a decoded config document. Unknown keys are ignored.
 */
export function parseConfig(value: unknown, source: string): MlctlConfig {
  if (value === null || value === undefined) {
    return {};
  }

  if (!isPlainObject(value)) {
    throw configError(`${source}: configuration must be a mapping`);
  }

  const config: MlctlConfig = {};

  for (const key of ["server", "featureGates", "statsFile"] as const) {
    const entry = value[key];
    if (entry === undefined) {
      continue;
    }
    if (typeof entry !== "string") {
      throw configError(`${source}: ${key} must be a string`);
    }
    config[key] = entry;
  }

  if (value.output !== undefined) {
    if (!isOutputFormat(value.output)) {
      throw configError(`${source}: output must be one of table, json, yaml`);
    }
    config.output = value.output;
  }

  if (value.maxColumnWidth !== undefined) {
    config.maxColumnWidth = parseMaxColumnWidth(value.maxColumnWidth, source);
  }

  if (value.color !== undefined) {
    if (typeof value.color !== "boolean") {
      throw configError(`${source}: color must be a boolean`);
    }
    config.color = value.color;
  }

  return config;
}

/** Returns undefined when the file does not exist. */
export async function loadConfigFile(filePath: string): Promise<MlctlConfig | undefined> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (err !== null && typeof err === "object" && "code" in err && err.code === "ENOENT") {
      return undefined;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw configError(`${filePath}: ${reason}`);
  }

  return parseConfig(parsed, filePath);
}

/** Later configs override earlier ones, key by key. */
export function mergeConfigs(...configs: Array<MlctlConfig | undefined>): MlctlConfig {
  const result: MlctlConfig = {};

  for (const config of configs) {
    if (config === undefined) {
      continue;
    }

    if (config.server !== undefined) result.server = config.server;
    if (config.output !== undefined) result.output = config.output;
    if (config.maxColumnWidth !== undefined) result.maxColumnWidth = config.maxColumnWidth;
    if (config.featureGates !== undefined) result.featureGates = config.featureGates;
    if (config.statsFile !== undefined) result.statsFile = config.statsFile;
    if (config.color !== undefined) result.color = config.color;
  }

  return result;
}

export interface LoadConfigOptions {
  /** Project config path; skips the upward search */
  configPath?: string;
  /** Directory holding the global config */
  homeDir?: string;
  /** Where the project config search starts */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function configFromEnv(env: NodeJS.ProcessEnv): MlctlConfig {
  const config: MlctlConfig = {};

  if (env.MESHLENS_SERVER) {
    config.server = env.MESHLENS_SERVER;
  }
  if (env.MESHLENS_OUTPUT) {
    const output = env.MESHLENS_OUTPUT.toLowerCase();
    if (!isOutputFormat(output)) {
      throw configError(`MESHLENS_OUTPUT: output must be one of table, json, yaml`);
    }
    config.output = output;
  }
  if (env.MESHLENS_MAX_COLUMN_WIDTH) {
    config.maxColumnWidth = parseMaxColumnWidth(env.MESHLENS_MAX_COLUMN_WIDTH, "MESHLENS_MAX_COLUMN_WIDTH");
  }
  if (env.MESHLENS_FEATURE_GATES) {
    config.featureGates = env.MESHLENS_FEATURE_GATES;
  }
  if (env.MESHLENS_STATS_FILE) {
    config.statsFile = env.MESHLENS_STATS_FILE;
  }
  if (env.NO_COLOR) {
    config.color = false;
  }

  return config;
}

/**
 * Priority, lowest first: defaults, ~/.mlctlrc, project .mlctlrc,
 * environment. Command flags are applied by each command on top.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<MlctlConfig> {
  const globalConfig = await loadConfigFile(getGlobalConfigPath(options.homeDir));

  const projectConfigPath = options.configPath ?? getProjectConfigPath(options.cwd);
  const projectConfig = projectConfigPath === undefined ? undefined : await loadConfigFile(projectConfigPath);
  if (options.configPath !== undefined && projectConfig === undefined) {
    throw configError(`config file not found: ${options.configPath}`);
  }

  const envConfig = configFromEnv(options.env ?? process.env);

  return mergeConfigs(DEFAULT_CONFIG, globalConfig, projectConfig, envConfig);
}
