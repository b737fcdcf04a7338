/**
 * Console logger for mlctl.
 *
 * Honors the global --verbose, --quiet, --no-color and --json flags. Also
 * satisfies the apiserver's ServerLogger so `mlctl serve` logs through it.
 */
import { Chalk, type ChalkInstance } from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Show debug messages */
  verbose?: boolean;
  /** Only show errors */
  quiet?: boolean;
  noColor?: boolean;
  /** Emit one JSON object per log line */
  json?: boolean;
}

export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Writes `data` to stdout regardless of quiet mode */
  json(data: unknown): void;
  configure(options: LoggerOptions): void;
  getOptions(): Readonly<LoggerOptions>;
}

let options: LoggerOptions = {
  verbose: false,
  quiet: false,
  noColor: false,
  json: false,
};

const colored = new Chalk();
const plain = new Chalk({ level: 0 });

function palette(): ChalkInstance {
  return options.noColor === true ? plain : colored;
}

function shouldOutput(level: LogLevel): boolean {
  if (options.quiet === true) {
    return level === "error";
  }

  return level !== "debug" || options.verbose === true;
}

function formatText(level: LogLevel, message: string): string {
  const c = palette();

  switch (level) {
    case "debug":
      return c.gray(`[debug] ${message}`);
    case "info":
      return message;
    case "warn":
      return c.yellow(`${c.bold("warning:")} ${message}`);
    case "error":
      return c.red(`${c.bold("error:")} ${message}`);
  }
}

function write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldOutput(level)) {
    return;
  }

  if (options.json === true) {
    const entry: JsonLogEntry = { level, message, timestamp: new Date().toISOString() };
    if (data !== undefined) {
      entry.data = data;
    }
    process.stdout.write(`${JSON.stringify(entry)}\n`);
    return;
  }

  const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
  stream.write(`${formatText(level, message)}\n`);

  if (data !== undefined && options.verbose === true) {
    process.stdout.write(`${palette().gray(JSON.stringify(data, null, 2))}\n`);
  }
}

export const logger: Logger = {
  debug(message, data) {
    write("debug", message, data);
  },

  info(message, data) {
    write("info", message, data);
  },

  warn(message, data) {
    write("warn", message, data);
  },

  error(message, data) {
    write("error", message, data);
  },

  json(data) {
    process.stdout.write(`${JSON.stringify(data, null, options.json === true ? 0 : 2)}\n`);
  },

  configure(next) {
    options = { ...options, ...next };
  },

  getOptions() {
    return { ...options };
  },
};

export const debug = logger.debug.bind(logger);
export const info = logger.info.bind(logger);
export const warn = logger.warn.bind(logger);
export const error = logger.error.bind(logger);
export const json = logger.json.bind(logger);

export function configureLogger(next: LoggerOptions): void {
  logger.configure(next);
}

export function getLoggerOptions(): Readonly<LoggerOptions> {
  return logger.getOptions();
}
