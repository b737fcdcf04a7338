import { isApiError, isFeatureDisabledError, isNotFoundError, ConfigError } from "@meshlens/apiserver";

import { isDecodeError } from "./transform/errors.js";
import { EXIT_CODES, type ExitCode } from "./types.js";

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
  exitCode: ExitCode;
}

export class CliError extends Error implements StructuredError {
  code: string;

  suggestion?: string;

  exitCode: ExitCode;

  constructor(error: StructuredError, options?: ErrorOptions) {
    super(error.message, options);
    this.name = "CliError";
    this.code = error.code;
    this.suggestion = error.suggestion;
    this.exitCode = error.exitCode;
  }
}

export function isCliError(value: unknown): value is CliError {
  return value instanceof CliError;
}

export function toCliError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }

  if (isDecodeError(error)) {
    return new CliError(
      {
        code: "DECODE_ERROR",
        message: error.message,
        exitCode: EXIT_CODES.DECODE_ERROR,
        suggestion:
          error.actualKind === `${error.expectedKind}List`
            ? "The input is a list; drop --single."
            : `Check that the input is a ${error.expectedKind} document.`,
      },
      { cause: error },
    );
  }

  if (isFeatureDisabledError(error)) {
    return featureDisabledError(error.message, error.feature);
  }

  if (isNotFoundError(error)) {
    return notFoundError(error.message);
  }

  if (isApiError(error)) {
    return new CliError(
      { code: "API_ERROR", message: error.message, exitCode: EXIT_CODES.GENERAL_ERROR },
      { cause: error },
    );
  }

  if (error instanceof ConfigError) {
    return configError(error.message);
  }

  if (error instanceof Error) {
    return new CliError(
      {
        code: "INTERNAL_ERROR",
        message: error.message,
        exitCode: EXIT_CODES.GENERAL_ERROR,
        suggestion: "Re-run with --verbose for details.",
      },
      { cause: error },
    );
  }

  return new CliError({
    code: "UNKNOWN_ERROR",
    message: "An unknown error occurred.",
    exitCode: EXIT_CODES.GENERAL_ERROR,
  });
}

export function usageError(message: string, suggestion?: string): CliError {
  return new CliError({ code: "INVALID_ARGUMENT", message, exitCode: EXIT_CODES.INVALID_ARGUMENT, suggestion });
}

export function configError(message: string, suggestion?: string): CliError {
  return new CliError({ code: "CONFIG_ERROR", message, exitCode: EXIT_CODES.CONFIG_ERROR, suggestion });
}

export function featureDisabledError(message: string, feature?: string): CliError {
  return new CliError({
    code: "FEATURE_DISABLED",
    message,
    exitCode: EXIT_CODES.CONFIG_ERROR,
    suggestion:
      feature === undefined
        ? "Enable the feature gate on the server."
        : `Restart the server with --feature-gates=${feature}=true.`,
  });
}

export function notFoundError(message: string): CliError {
  return new CliError({ code: "NOT_FOUND", message, exitCode: EXIT_CODES.GENERAL_ERROR });
}

export function networkError(message: string, suggestion?: string, cause?: unknown): CliError {
  return new CliError({ code: "NETWORK_ERROR", message, exitCode: EXIT_CODES.NETWORK_ERROR, suggestion }, { cause });
}
