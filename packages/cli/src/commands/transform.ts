/**
 * mlctl transform command
 *
 * Reads a raw API object or list (JSON, from a file or stdin) and prints its
 * display form.
 */
import { readFile } from "node:fs/promises";

import { Command, Option } from "commander";

import { usageError } from "../errors.js";
import { lookupTransformer, type TransformerRegistration } from "../transform/index.js";
import type { TransformSource } from "../transform/dispatcher.js";
import { isOutputFormat, type OutputFormat } from "../types.js";
import type { MlctlConfig } from "../utils/config.js";
import { debug } from "../utils/logger.js";
import { resolveCommandContext } from "./context.js";
import { createOutputOption, createWidthOption } from "./options.js";
import { renderResult } from "./render.js";

export interface TransformOptions {
  /** Reads stdin when absent */
  file?: string;
  /** Decode one object instead of a list */
  single: boolean;
  output: OutputFormat;
  width: number;
}

export function requireTransformer(resource: string): TransformerRegistration {
  const registration = lookupTransformer(resource);
  if (registration === undefined) {
    throw usageError(`unknown resource "${resource}"`, "Run `mlctl resources` to list supported resources.");
  }
  return registration;
}

/** Flags win over configuration. */
export function resolveOutputSettings(
  options: Record<string, unknown>,
  config: MlctlConfig,
): { output: OutputFormat; width: number } {
  const output = isOutputFormat(options.output) ? options.output : (config.output ?? "table");
  const width = typeof options.width === "number" ? options.width : (config.maxColumnWidth ?? 62);
  return { output, width };
}

async function readStdin(): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

export async function readTransformInput(file?: string): Promise<Uint8Array> {
  if (file === undefined || file === "-") {
    return readStdin();
  }
  return readFile(file);
}

export function executeTransform(resource: string, input: TransformSource, options: Omit<TransformOptions, "file">): string {
  const registration = requireTransformer(resource);
  debug(`transforming ${options.single ? registration.kind : registration.listKind}`);

  const result = options.single ? registration.transform(input, true) : registration.transform(input, false);
  return renderResult(result, options.output, options.width);
}

export function createTransformCommand(): Command {
  return new Command("transform")
    .description("Convert a raw API object or list into its display form")
    .addHelpText(
      "after",
      `
Examples:
  $ mlctl transform appliedtogroup -f groups.json
  $ mlctl transform netpol --single -o yaml < policy.json
  $ mlctl transform anps -f stats.json -w 40`,
    )
    .argument("<resource>", "Resource name or alias")
    .addOption(new Option("-f, --file <path>", "Read the document from a file instead of stdin"))
    .addOption(new Option("--single", "Decode a single object instead of a list").default(false))
    .addOption(createOutputOption())
    .addOption(createWidthOption())
    .action(async (resource: string, options: Record<string, unknown>, command: Command) => {
      const { config } = await resolveCommandContext(command);
      const registration = requireTransformer(resource);
      const file = typeof options.file === "string" ? options.file : undefined;
      const input = await readTransformInput(file);

      console.log(
        executeTransform(registration.resource, input, {
          single: options.single === true,
          ...resolveOutputSettings(options, config),
        }),
      );
    });
}
