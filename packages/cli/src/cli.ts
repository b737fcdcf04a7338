/**
 * Main CLI setup using Commander.js
 *
 * Creates the program with its global options and registers every command.
 */
import { Command, CommanderError, Option } from "commander";

import { createGetCommand } from "./commands/get.js";
import { createResourcesCommand } from "./commands/resources.js";
import { createServeCommand } from "./commands/serve.js";
import { createTransformCommand } from "./commands/transform.js";
import { createVersionCommand } from "./commands/version.js";
import type { GlobalOptions } from "./commands/context.js";
import { toCliError } from "./errors.js";
import { formatCliError } from "./formatter.js";
import { EXIT_CODES, type ExitCode } from "./types.js";
import { configureLogger, error as logError, getLoggerOptions } from "./utils/logger.js";
import { CLI_VERSION } from "./version.js";

export const CLI_NAME = "mlctl";

export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Inspect control-plane objects and policy traffic stats")
    .version(CLI_VERSION, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display help for command")
    .addHelpText(
      "after",
      `
Examples:
  $ mlctl transform atg -f groups.json     Print AppliedToGroups as a table
  $ mlctl serve --stats-file stats.yaml    Serve policy stats
  $ mlctl get nps -A                       List policy stats in every namespace
  $ mlctl resources                        List supported resources`,
    );

  program
    .addOption(new Option("-v, --verbose", "Enable verbose output").default(false))
    .addOption(new Option("-q, --quiet", "Minimize output (only errors)").default(false))
    .addOption(new Option("-c, --config <path>", "Configuration file path"))
    .addOption(new Option("--no-color", "Disable color output"))
    .addOption(new Option("--json", "Output in JSON format").default(false));

  program.hook("preAction", (_program, actionCommand) => {
    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    configureLogger({
      verbose: opts.verbose,
      quiet: opts.quiet,
      noColor: opts.color === false,
      json: opts.json,
    });
  });

  program.addCommand(createTransformCommand());
  program.addCommand(createGetCommand());
  program.addCommand(createServeCommand());
  program.addCommand(createVersionCommand());
  program.addCommand(createResourcesCommand());

  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
  }

  return program;
}

function commanderExitCode(err: CommanderError): ExitCode {
  return err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_ARGUMENT;
}

/**
 * Runs the CLI and reports failures. Resolves to the exit code, which is
 * also stored in `process.exitCode`.
 */
export async function run(argv: string[] = process.argv): Promise<ExitCode> {
  const program = createProgram();

  let exitCode: ExitCode = EXIT_CODES.SUCCESS;
  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander already printed its message
      exitCode = commanderExitCode(err);
    } else {
      const cliError = toCliError(err);
      if (getLoggerOptions().json === true) {
        process.stderr.write(`${formatCliError(cliError, true)}\n`);
      } else {
        logError(formatCliError(cliError, false));
      }
      exitCode = cliError.exitCode;
    }
  }

  process.exitCode = exitCode;
  return exitCode;
}
