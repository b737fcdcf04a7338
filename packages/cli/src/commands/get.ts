/**
 * mlctl get command
 *
 * Fetches stats resources from the apiserver and prints their display form.
 */
import { Command, Option } from "commander";
import ora from "ora";

import { usageError } from "../errors.js";
import { HttpStatsClient, type StatsClient } from "../services/client.js";
import type { OutputFormat } from "../types.js";
import { getLoggerOptions } from "../utils/logger.js";
import { resolveCommandContext } from "./context.js";
import { createOutputOption, createWidthOption } from "./options.js";
import { renderResult } from "./render.js";
import { requireTransformer, resolveOutputSettings } from "./transform.js";

export const DEFAULT_NAMESPACE = "default";

export interface GetOptions {
  name?: string;
  namespace?: string;
  allNamespaces: boolean;
  output: OutputFormat;
  width: number;
}

/** An empty result means every namespace. */
export function resolveNamespace(options: Pick<GetOptions, "name" | "namespace" | "allNamespaces">): string {
  if (options.allNamespaces) {
    if (options.name !== undefined) {
      throw usageError("a resource cannot be retrieved by name across all namespaces");
    }
    return "";
  }

  return options.namespace ?? DEFAULT_NAMESPACE;
}

export async function executeGet(client: StatsClient, resource: string, options: GetOptions): Promise<string> {
  const registration = requireTransformer(resource);
  if (!registration.served) {
    throw usageError(
      `resource "${registration.resource}" is not served by the stats API`,
      "Use `mlctl transform` for control-plane objects.",
    );
  }

  const namespace = resolveNamespace(options);
  const quiet = getLoggerOptions().quiet === true;
  const spinner = ora();
  if (options.output === "table" && !quiet) {
    spinner.start(`Fetching ${registration.resource}...`);
  }

  try {
    const result =
      options.name === undefined
        ? registration.transform(await client.list(registration.resource, namespace), false)
        : registration.transform(await client.get(registration.resource, namespace, options.name), true);
    spinner.stop();
    return renderResult(result, options.output, options.width);
  } catch (err) {
    if (spinner.isSpinning) {
      spinner.fail(`Failed to fetch ${registration.resource}`);
    }
    throw err;
  }
}

export function createGetCommand(): Command {
  return new Command("get")
    .description("Display stats resources served by the apiserver")
    .addHelpText(
      "after",
      `
Examples:
  $ mlctl get networkpolicystats -A
  $ mlctl get anps -n prod web-allow
  $ mlctl get nps -n prod -o json --server http://10.0.0.5:10349`,
    )
    .argument("<resource>", "Resource name or alias")
    .argument("[name]", "Resource name; lists when omitted")
    .addOption(new Option("-n, --namespace <namespace>", `Namespace (default "${DEFAULT_NAMESPACE}")`))
    .addOption(new Option("-A, --all-namespaces", "List across all namespaces").default(false))
    .addOption(createOutputOption())
    .addOption(createWidthOption())
    .addOption(new Option("--server <url>", "Base URL of the stats apiserver"))
    .action(async (resource: string, name: string | undefined, options: Record<string, unknown>, command: Command) => {
      const { config } = await resolveCommandContext(command);
      const server = typeof options.server === "string" ? options.server : config.server;
      if (server === undefined) {
        throw usageError("no apiserver configured", "Pass --server or set MESHLENS_SERVER.");
      }

      const output = await executeGet(new HttpStatsClient(server), resource, {
        name,
        namespace: typeof options.namespace === "string" ? options.namespace : undefined,
        allNamespaces: options.allNamespaces === true,
        ...resolveOutputSettings(options, config),
      });
      console.log(output);
    });
}
