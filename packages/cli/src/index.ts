export { CLI_NAME, createProgram, run } from "./cli.js";
export * from "./commands/index.js";
export { CliError, isCliError, toCliError } from "./errors.js";
export type { StructuredError } from "./errors.js";
export { formatCliError, formatOutput, formatTable, renderColumns } from "./formatter.js";
export { HttpStatsClient } from "./services/client.js";
export type { StatsClient } from "./services/client.js";
export * from "./transform/index.js";
export { EXIT_CODES } from "./types.js";
export type { ExitCode, OutputFormat } from "./types.js";
export { loadConfig } from "./utils/config.js";
export type { MlctlConfig } from "./utils/config.js";
export { BUILD_INFO, CLI_VERSION, getFullVersion, getFullVersionWithRuntimeInfo } from "./version.js";
export type { BuildInfo } from "./version.js";
