import { InvalidArgumentError, Option } from "commander";

import { OUTPUT_FORMATS } from "../types.js";

export function parseWidth(value: string): number {
  const width = Number(value);
  if (value.trim().length === 0 || !Number.isInteger(width) || width < 0) {
    throw new InvalidArgumentError("width must be a non-negative integer.");
  }
  return width;
}

/** Without a default, so configuration can supply one. */
export function createOutputOption(): Option {
  return new Option("-o, --output <format>", "Output format").choices(OUTPUT_FORMATS);
}

export function createWidthOption(): Option {
  return new Option("-w, --width <columns>", "Maximum width of summarized table cells").argParser(parseWidth);
}
