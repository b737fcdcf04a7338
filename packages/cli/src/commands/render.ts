import { formatOutput, formatTable } from "../formatter.js";
import type { TableOutput } from "../transform/common.js";
import type { OutputFormat } from "../types.js";

export function renderResult(result: TableOutput | TableOutput[], format: OutputFormat, maxColumnLength: number): string {
  if (format === "table") {
    return formatTable(Array.isArray(result) ? result : [result], maxColumnLength);
  }

  return formatOutput(result, format);
}
