import { describe, expect, it } from "vitest";

import { getFullVersion, getFullVersionWithRuntimeInfo, type BuildInfo } from "../src/version.js";

function build(overrides: Partial<BuildInfo>): BuildInfo {
  return { version: "v1.2.0", gitSHA: "", gitTreeState: "", releaseStatus: "unreleased", ...overrides };
}

describe("getFullVersion", () => {
  it("reports UNKNOWN without a version", () => {
    expect(getFullVersion(build({ version: "", releaseStatus: "released" }))).toBe("UNKNOWN");
  });

  it("uses the bare version for releases", () => {
    expect(getFullVersion(build({ releaseStatus: "released", gitSHA: "abc123", gitTreeState: "dirty" }))).toBe("v1.2.0");
  });

  it("adds build information to unreleased versions", () => {
    expect(getFullVersion(build({}))).toBe("v1.2.0-unknown");
    expect(getFullVersion(build({ gitSHA: "abc123", gitTreeState: "clean" }))).toBe("v1.2.0-abc123");
    expect(getFullVersion(build({ gitSHA: "abc123", gitTreeState: "dirty" }))).toBe("v1.2.0-abc123.dirty");
  });
});

describe("getFullVersionWithRuntimeInfo", () => {
  it("appends the platform and architecture", () => {
    expect(getFullVersionWithRuntimeInfo(build({ releaseStatus: "released" }), { platform: "linux", arch: "arm64" })).toBe(
      "v1.2.0 linux/arm64",
    );
  });
});
