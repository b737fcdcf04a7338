/**
 * mlctl serve command
 *
 * Serves the read-only stats API over a snapshot file until interrupted.
 */
import type { Server } from "node:http";

import {
  NetworkPolicyStatsFeature,
  createApiNodeServer,
  createStatsRegistry,
  emptySnapshot,
  loadStatsSnapshot,
  providersFromSnapshot,
  resolveServerConfig,
} from "@meshlens/apiserver";
import { Command, Option } from "commander";

import { logger } from "../utils/logger.js";
import { getFullVersion } from "../version.js";
import { resolveCommandContext } from "./context.js";

export interface ServeOptions {
  host?: string;
  port?: string;
  featureGates?: string;
  statsFile?: string;
  env?: NodeJS.ProcessEnv;
}

export interface RunningApiServer {
  url: string;
  server: Server;
  close(): Promise<void>;
}

export async function startApiServer(options: ServeOptions): Promise<RunningApiServer> {
  const config = resolveServerConfig(options);
  const snapshot = config.statsFile === undefined ? emptySnapshot() : await loadStatsSnapshot(config.statsFile);

  const server = createApiNodeServer({
    stores: createStatsRegistry(config.featureGates, providersFromSnapshot(snapshot)),
    logger,
    version: getFullVersion(),
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = address !== null && typeof address !== "string" ? address.port : config.port;
  const url = `http://${config.host}:${port}`;

  logger.info(`serving stats API on ${url}`, {
    featureGates: config.featureGates.toString(),
    networkPolicyStats: snapshot.networkPolicyStats.length,
    advancedNetworkPolicyStats: snapshot.advancedNetworkPolicyStats.length,
  });
  if (!config.featureGates.isEnabled(NetworkPolicyStatsFeature)) {
    logger.warn(`feature gate ${NetworkPolicyStatsFeature} is disabled; stats requests will be rejected`);
  }

  return {
    url,
    server,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error === undefined) {
            resolve();
            return;
          }
          reject(error);
        });
      }),
  };
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

export function createServeCommand(): Command {
  return new Command("serve")
    .description("Serve the read-only stats API")
    .addHelpText(
      "after",
      `
Examples:
  $ mlctl serve --stats-file stats.yaml --feature-gates NetworkPolicyStats=true
  $ mlctl serve --host 0.0.0.0 --port 8443 --feature-gates NetworkPolicyStats=true,AdvancedPolicy=true`,
    )
    .addOption(new Option("--host <host>", "Address to bind"))
    .addOption(new Option("--port <port>", "Port to bind"))
    .addOption(new Option("--feature-gates <gates>", "Feature gates, e.g. NetworkPolicyStats=true"))
    .addOption(new Option("--stats-file <path>", "YAML or JSON stats snapshot to serve"))
    .action(async (options: Record<string, unknown>, command: Command) => {
      const { config } = await resolveCommandContext(command);
      const running = await startApiServer({
        host: typeof options.host === "string" ? options.host : undefined,
        port: typeof options.port === "string" ? options.port : undefined,
        featureGates: typeof options.featureGates === "string" ? options.featureGates : config.featureGates,
        statsFile: typeof options.statsFile === "string" ? options.statsFile : config.statsFile,
      });

      const signal = await waitForShutdownSignal();
      logger.info(`received ${signal}, shutting down`);
      await running.close();
    });
}
