import { describe, expect, it } from "vitest";

import { CliError } from "../src/errors.js";
import { formatCliError, formatOutput, formatTable, renderColumns } from "../src/formatter.js";
import { AppliedToGroupResponse } from "../src/transform/appliedtogroup.js";
import { StatsResponse } from "../src/transform/stats.js";

describe("renderColumns", () => {
  it("pads every column but the last with a three-space gutter", () => {
    expect(renderColumns(["NAME", "PODS"], [["a", "x/y"], ["longer-name", "<NONE>"]])).toBe(
      ["NAME          PODS", "a             x/y", "longer-name   <NONE>"].join("\n"),
    );
  });
});

describe("formatTable", () => {
  it("prints a notice when there is nothing to show", () => {
    expect(formatTable([], 10)).toBe("No resources found.");
  });

  it("sorts rows by their first column", () => {
    const outputs = [
      new AppliedToGroupResponse("web", [{ pod: { namespace: "prod", name: "web-0" }, ips: [], ports: [] }]),
      new AppliedToGroupResponse("api", []),
    ];

    expect(formatTable(outputs, 40)).toBe(["NAME   PODS", "api    <NONE>", "web    prod/web-0"].join("\n"));
  });

  it("keeps the input order of rows with the same first column", () => {
    const outputs = [
      new StatsResponse("prod", "b", 1, 2, 3, ""),
      new StatsResponse("dev", "z", 0, 0, 0, ""),
      new StatsResponse("prod", "a", 4, 5, 6, ""),
    ];

    const lines = formatTable(outputs, 0).split("\n");
    expect(lines.map((line) => line.split(/\s+/)[1])).toEqual(["NAME", "z", "b", "a"]);
  });
});

describe("formatOutput", () => {
  const response = new StatsResponse("prod", "allow-web", 1, 10, 100, "2024-05-01T10:00:00Z");

  it("serializes JSON with two-space indentation", () => {
    expect(formatOutput([response], "json")).toBe(
      JSON.stringify(
        [
          {
            namespace: "prod",
            name: "allow-web",
            sessions: 1,
            packets: 10,
            bytes: 100,
            createdAt: "2024-05-01T10:00:00Z",
          },
        ],
        null,
        2,
      ),
    );
  });

  it("serializes YAML", () => {
    expect(formatOutput(response, "yaml")).toBe(
      [
        "namespace: prod",
        "name: allow-web",
        "sessions: 1",
        "packets: 10",
        "bytes: 100",
        "createdAt: 2024-05-01T10:00:00Z",
      ].join("\n"),
    );
  });
});

describe("formatCliError", () => {
  const error = new CliError({
    code: "NOT_FOUND",
    message: 'networkpolicystats "web" not found',
    exitCode: 1,
    suggestion: "Check the namespace.",
  });

  it("prints the code, message and suggestion", () => {
    expect(formatCliError(error, false)).toBe(
      '[NOT_FOUND] networkpolicystats "web" not found\nsuggestion: Check the namespace.',
    );
  });

  it("prints a JSON envelope", () => {
    expect(JSON.parse(formatCliError(error, true))).toEqual({
      error: { code: "NOT_FOUND", message: 'networkpolicystats "web" not found', suggestion: "Check the namespace." },
    });
  });
});
