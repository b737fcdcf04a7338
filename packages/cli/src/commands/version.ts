import { Command, Option } from "commander";

import { HttpStatsClient, type StatsClient } from "../services/client.js";
import { getLoggerOptions, json } from "../utils/logger.js";
import { getFullVersionWithRuntimeInfo } from "../version.js";
import { resolveCommandContext } from "./context.js";

export interface VersionReport {
  clientVersion: string;
  serverVersion?: string;
}

export async function collectVersions(client: StatsClient | undefined): Promise<VersionReport> {
  const report: VersionReport = { clientVersion: getFullVersionWithRuntimeInfo() };
  if (client !== undefined) {
    report.serverVersion = await client.serverVersion();
  }
  return report;
}

export function createVersionCommand(): Command {
  return new Command("version")
    .description("Print the client and server versions")
    .addOption(new Option("--client", "Only print the client version").default(false))
    .addOption(new Option("--server <url>", "Base URL of the stats apiserver"))
    .action(async (options: Record<string, unknown>, command: Command) => {
      const { config } = await resolveCommandContext(command);
      const server = typeof options.server === "string" ? options.server : config.server;
      const client = options.client === true || server === undefined ? undefined : new HttpStatsClient(server);

      const report = await collectVersions(client);

      if (getLoggerOptions().json === true) {
        json(report);
        return;
      }

      console.log(`Client Version: ${report.clientVersion}`);
      if (report.serverVersion !== undefined) {
        console.log(`Server Version: ${report.serverVersion}`);
      }
    });
}
