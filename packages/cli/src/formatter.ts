import YAML from "yaml";

import type { CliError } from "./errors.js";
import type { TableOutput } from "./transform/common.js";

export const NO_RESOURCES_MESSAGE = "No resources found.";

const COLUMN_GUTTER = "   ";

function compareFirstColumn(left: readonly string[], right: readonly string[]): number {
  const a = left[0] ?? "";
  const b = right[0] ?? "";
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/**
 * Aligns `rows` under `header`. Columns are separated by a three-space
 * gutter; the last column is not padded.
 */
export function renderColumns(header: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  const widths = header.map((title, column) =>
    rows.reduce((width, row) => Math.max(width, (row[column] ?? "").length), title.length),
  );
  const lastColumn = header.length - 1;

  return [header, ...rows]
    .map((row) =>
      header
        .map((_, column) => {
          const cell = row[column] ?? "";
          return column === lastColumn ? cell : cell.padEnd(widths[column] ?? 0);
        })
        .join(COLUMN_GUTTER),
    )
    .join("\n");
}

/**
 * Prints responses as a table. Rows are stable-sorted by their first column
 * when the responses ask for it.
 */
export function formatTable(outputs: readonly TableOutput[], maxColumnLength: number): string {
  const [first] = outputs;
  if (first === undefined) {
    return NO_RESOURCES_MESSAGE;
  }

  const rows = outputs.map((output) => output.getTableRow(maxColumnLength));
  if (first.sortRows()) {
    rows.sort(compareFirstColumn);
  }

  return renderColumns(first.getTableHeader(), rows);
}

export function formatOutput(value: unknown, format: "json" | "yaml"): string {
  // drops class prototypes and undefined fields before serializing
  const plain: unknown = JSON.parse(JSON.stringify(value));

  if (format === "json") {
    return JSON.stringify(plain, null, 2);
  }

  return YAML.stringify(plain).trimEnd();
}

export function formatCliError(error: CliError, json: boolean): string {
  if (json) {
    return JSON.stringify({
      error: {
        code: error.code,
        message: error.message,
        suggestion: error.suggestion,
      },
    });
  }

  const lines = [`[${error.code}] ${error.message}`];
  if (error.suggestion !== undefined) {
    lines.push(`suggestion: ${error.suggestion}`);
  }
  return lines.join("\n");
}
