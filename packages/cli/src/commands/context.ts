import type { Command } from "commander";

import { loadConfig, type MlctlConfig } from "../utils/config.js";
import { configureLogger } from "../utils/logger.js";

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** Project configuration file */
  config?: string;
  /** false under --no-color */
  color?: boolean;
  json?: boolean;
}

export interface CommandContext {
  globalOptions: GlobalOptions;
  config: MlctlConfig;
}

/**
 * Loads configuration for the running command. A `color: false` from any
 * configuration source turns colors off as well.
 */
export async function resolveCommandContext(command: Command): Promise<CommandContext> {
  const globalOptions = command.optsWithGlobals<GlobalOptions>();
  const config = await loadConfig({ configPath: globalOptions.config });

  if (config.color === false) {
    configureLogger({ noColor: true });
  }

  return { globalOptions, config };
}
