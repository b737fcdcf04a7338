/**
 * Command wiring tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { run } from "../src/cli.js";
import { startApiServer, type RunningApiServer } from "../src/commands/serve.js";
import { configureLogger, getLoggerOptions } from "../src/utils/logger.js";
import { getFullVersionWithRuntimeInfo } from "../src/version.js";
import { appliedToGroup, list, pod } from "../test/fixtures.js";

function collectConsoleLogs(calls: Array<unknown[]>): string {
  return calls
    .map((args) => args.map((arg) => String(arg)).join(" "))
    .join("\n");
}

function trafficRecord(namespace: string, name: string, sessions: number) {
  return {
    metadata: { namespace, name },
    trafficStats: { packets: sessions * 10, bytes: sessions * 1000, sessions },
  };
}

describe("mlctl commands", () => {
  let tempDir: string;
  let originalCwd: string;

  beforeEach(() => {
    originalCwd = process.cwd();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mlctl-commands-"));
    process.chdir(tempDir);
    configureLogger({
      verbose: false,
      quiet: false,
      noColor: false,
      json: false,
    });
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.chdir(originalCwd);
    if (tempDir && fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
    process.exitCode = undefined;
  });

  it("applies global options before the command runs", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});

    const exitCode = await run(["node", "mlctl", "--quiet", "--no-color", "resources"]);

    expect(exitCode).toBe(0);
    expect(getLoggerOptions().quiet).toBe(true);
    expect(getLoggerOptions().noColor).toBe(true);
  });

  it("lists the supported resources", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await run(["node", "mlctl", "resources"]);

    const lines = collectConsoleLogs(logSpy.mock.calls).split("\n");
    expect(lines).toHaveLength(6);
    expect(lines[1]).toBe(
      "appliedtogroup               atg          controlplane.meshlens.io/v1beta2   AppliedToGroup               false",
    );
  });

  it("prints the client version only", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await run(["node", "mlctl", "version", "--client"]);

    expect(collectConsoleLogs(logSpy.mock.calls)).toBe(`Client Version: ${getFullVersionWithRuntimeInfo()}`);
  });

  describe("transform", () => {
    function writeGroups(): string {
      const filePath = path.join(tempDir, "groups.json");
      const groups = list("AppliedToGroupList", [
        appliedToGroup("web", [pod("prod", "web-0"), pod("prod", "web-1")]),
        appliedToGroup("api", []),
      ]);
      fs.writeFileSync(filePath, JSON.stringify(groups), "utf8");
      return filePath;
    }

    it("prints a list as a sorted table", async () => {
      const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

      const exitCode = await run(["node", "mlctl", "transform", "atg", "-f", writeGroups(), "-w", "20"]);

      expect(exitCode).toBe(0);
      expect(collectConsoleLogs(logSpy.mock.calls)).toBe(
        ["NAME   PODS", "api    <NONE>", "web    prod/web-0 + 1 more..."].join("\n"),
      );
    });

    it("rejects an unknown resource with a usage error", async () => {
      vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      const exitCode = await run(["node", "mlctl", "transform", "pods", "-f", writeGroups()]);

      expect(exitCode).toBe(2);
      expect(process.exitCode).toBe(2);
    });

    it("reports a list decoded as a single object", async () => {
      const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      const exitCode = await run(["node", "mlctl", "--no-color", "transform", "atg", "--single", "-f", writeGroups()]);

      expect(exitCode).toBe(4);
      expect(stderrSpy).toHaveBeenCalledWith(
        "error: [DECODE_ERROR] unable to decode AppliedToGroup: document has kind AppliedToGroupList\n" +
          "suggestion: The input is a list; drop --single.\n",
      );
    });

    it("maps an invalid option choice to a usage exit code", async () => {
      vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      const exitCode = await run(["node", "mlctl", "transform", "atg", "-o", "xml", "-f", writeGroups()]);

      expect(exitCode).toBe(2);
    });
  });

  describe("get against a running server", () => {
    let server: RunningApiServer | undefined;

    async function serve(featureGates: string): Promise<string> {
      const statsFile = path.join(tempDir, "stats.json");
      fs.writeFileSync(
        statsFile,
        JSON.stringify({
          networkPolicyStats: [trafficRecord("foo1", "bar1", 2), trafficRecord("foo", "bar", 1)],
          advancedNetworkPolicyStats: [trafficRecord("foo", "bar", 1)],
        }),
        "utf8",
      );
      configureLogger({ quiet: true });
      server = await startApiServer({ host: "127.0.0.1", port: "0", featureGates, statsFile, env: {} });
      return server.url;
    }

    afterEach(async () => {
      await server?.close();
      server = undefined;
    });

    it("lists stats across every namespace", async () => {
      const url = await serve("NetworkPolicyStats=true");
      const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

      const exitCode = await run(["node", "mlctl", "--quiet", "get", "nps", "-A", "--server", url]);

      expect(exitCode).toBe(0);
      expect(collectConsoleLogs(logSpy.mock.calls)).toBe(
        [
          "NAMESPACE   NAME   SESSIONS   PACKETS   BYTES   CREATED AT",
          "foo         bar    1          10        1000    <NONE>",
          "foo1        bar1   2          20        2000    <NONE>",
        ].join("\n"),
      );
    });

    it("prints a single record as JSON", async () => {
      const url = await serve("NetworkPolicyStats=true");
      const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

      await run(["node", "mlctl", "--quiet", "get", "nps", "bar1", "-n", "foo1", "-o", "json", "--server", url]);

      expect(JSON.parse(collectConsoleLogs(logSpy.mock.calls))).toEqual({
        namespace: "foo1",
        name: "bar1",
        sessions: 2,
        packets: 20,
        bytes: 2000,
        createdAt: "",
      });
    });

    it("reports a missing record as not found", async () => {
      const url = await serve("NetworkPolicyStats=true");
      vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      const exitCode = await run(["node", "mlctl", "--quiet", "get", "nps", "missing", "-n", "foo", "--server", url]);

      expect(exitCode).toBe(1);
    });

    it("reports a disabled feature gate", async () => {
      const url = await serve("NetworkPolicyStats=true,AdvancedPolicy=false");
      const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      const exitCode = await run(["node", "mlctl", "--quiet", "--no-color", "get", "anps", "-A", "--server", url]);

      expect(exitCode).toBe(3);
      expect(stderrSpy).toHaveBeenCalledWith(
        "error: [FEATURE_DISABLED] feature AdvancedPolicy disabled, enable it with --feature-gates=AdvancedPolicy=true\n" +
          "suggestion: Restart the server with --feature-gates=AdvancedPolicy=true.\n",
      );
    });

    it("writes only the error when no spinner is shown", async () => {
      const url = await serve("NetworkPolicyStats=true,AdvancedPolicy=false");
      vi.spyOn(console, "log").mockImplementation(() => {});
      const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      const exitCode = await run(["node", "mlctl", "--json", "get", "anps", "-A", "-o", "json", "--server", url]);

      expect(exitCode).toBe(3);
      expect(stderrSpy).toHaveBeenCalledTimes(1);
      expect(stderrSpy).toHaveBeenCalledWith(
        `${JSON.stringify({
          error: {
            code: "FEATURE_DISABLED",
            message: "feature AdvancedPolicy disabled, enable it with --feature-gates=AdvancedPolicy=true",
            suggestion: "Restart the server with --feature-gates=AdvancedPolicy=true.",
          },
        })}\n`,
      );
    });

    it("refuses to get resources the server does not serve", async () => {
      const url = await serve("NetworkPolicyStats=true");
      vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      const exitCode = await run(["node", "mlctl", "get", "atg", "--server", url]);

      expect(exitCode).toBe(2);
    });
  });
});
