import { arch, platform } from "node:process";

export type GitTreeState = "" | "clean" | "dirty";

export type ReleaseStatus = "released" | "unreleased";

export interface BuildInfo {
  /** Semantic version without build information, empty when unknown */
  version: string;
  /** Empty when git was not available at build time */
  gitSHA: string;
  gitTreeState: GitTreeState;
  /** Unreleased builds carry build information in their full version */
  releaseStatus: ReleaseStatus;
}

export const CLI_VERSION = "0.1.0";

export const BUILD_INFO: Readonly<BuildInfo> = {
  version: CLI_VERSION,
  gitSHA: "",
  gitTreeState: "",
  releaseStatus: "unreleased",
};

export function getFullVersion(info: Readonly<BuildInfo> = BUILD_INFO): string {
  if (info.version.length === 0) {
    return "UNKNOWN";
  }
  if (info.releaseStatus === "released") {
    return info.version;
  }
  if (info.gitSHA.length === 0) {
    return `${info.version}-unknown`;
  }
  if (info.gitTreeState === "dirty") {
    return `${info.version}-${info.gitSHA}.dirty`;
  }
  return `${info.version}-${info.gitSHA}`;
}

export function getFullVersionWithRuntimeInfo(
  info: Readonly<BuildInfo> = BUILD_INFO,
  runtime: { platform: string; arch: string } = { platform, arch },
): string {
  return `${getFullVersion(info)} ${runtime.platform}/${runtime.arch}`;
}
