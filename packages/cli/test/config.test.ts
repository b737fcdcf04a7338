import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CliError } from "../src/errors.js";
import { DEFAULT_CONFIG, getProjectConfigPath, loadConfig, mergeConfigs, parseConfig } from "../src/utils/config.js";

describe("parseConfig", () => {
  it("keeps known keys", () => {
    expect(
      parseConfig({ server: "http://stats:10349", output: "yaml", maxColumnWidth: "40", color: false, extra: 1 }, "rc"),
    ).toEqual({ server: "http://stats:10349", output: "yaml", maxColumnWidth: 40, color: false });
  });

  it("treats an empty document as no configuration", () => {
    expect(parseConfig(null, "rc")).toEqual({});
  });

  it("rejects values of the wrong type", () => {
    expect(() => parseConfig({ output: "wide" }, "rc")).toThrowError("rc: output must be one of table, json, yaml");
    expect(() => parseConfig({ maxColumnWidth: -1 }, "rc")).toThrowError(CliError);
    expect(() => parseConfig(["server"], "rc")).toThrowError("rc: configuration must be a mapping");
  });
});

describe("mergeConfigs", () => {
  it("lets later sources win key by key", () => {
    expect(mergeConfigs({ server: "a", output: "json" }, undefined, { server: "b" })).toEqual({ server: "b", output: "json" });
  });
});

describe("loadConfig", () => {
  let tempDir: string;
  let homeDir: string;
  let projectDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mlctl-config-"));
    homeDir = path.join(tempDir, "home");
    projectDir = path.join(tempDir, "project", "nested");
    fs.mkdirSync(homeDir, { recursive: true });
    fs.mkdirSync(projectDir, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("falls back to defaults", async () => {
    const config = await loadConfig({ homeDir, cwd: projectDir, env: {} });

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it("applies global, project and environment sources in order", async () => {
    fs.writeFileSync(path.join(homeDir, ".mlctlrc"), "server: http://global:1\noutput: json\nmaxColumnWidth: 30\n");
    fs.writeFileSync(path.join(tempDir, "project", ".mlctlrc"), "server: http://project:2\n");

    const config = await loadConfig({
      homeDir,
      cwd: projectDir,
      env: { MESHLENS_MAX_COLUMN_WIDTH: "12", NO_COLOR: "1" },
    });

    expect(config).toEqual({
      server: "http://project:2",
      output: "json",
      maxColumnWidth: 12,
      color: false,
    });
  });

  it("finds the nearest project config", () => {
    const configPath = path.join(tempDir, "project", ".mlctlrc");
    fs.writeFileSync(configPath, "output: yaml\n");

    expect(getProjectConfigPath(projectDir)).toBe(configPath);
  });

  it("fails when an explicit config file is missing", async () => {
    await expect(
      loadConfig({ homeDir, configPath: path.join(tempDir, "missing.yaml"), env: {} }),
    ).rejects.toThrowError(`config file not found: ${path.join(tempDir, "missing.yaml")}`);
  });

  it("rejects invalid environment values", async () => {
    await expect(loadConfig({ homeDir, cwd: projectDir, env: { MESHLENS_OUTPUT: "xml" } })).rejects.toThrowError(
      "MESHLENS_OUTPUT: output must be one of table, json, yaml",
    );
  });
});
