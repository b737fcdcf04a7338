import { Command } from "commander";

import { renderColumns } from "../formatter.js";
import { listResources } from "../transform/index.js";
import { getLoggerOptions, json } from "../utils/logger.js";

export function formatResourceTable(): string {
  const rows = listResources().map((registration) => [
    registration.resource,
    registration.aliases.join(","),
    registration.apiVersion,
    registration.kind,
    registration.served ? "true" : "false",
  ]);

  return renderColumns(["NAME", "SHORTNAMES", "APIVERSION", "KIND", "SERVED"], rows);
}

export function createResourcesCommand(): Command {
  return new Command("resources").description("List the resources mlctl can transform").action(() => {
    if (getLoggerOptions().json === true) {
      json(
        listResources().map(({ resource, aliases, kind, listKind, apiVersion, served }) => ({
          resource,
          aliases,
          kind,
          listKind,
          apiVersion,
          served,
        })),
      );
      return;
    }

    console.log(formatResourceTable());
  });
}
