export * from "./json.js";
export * from "./meta.js";
export * from "./controlplane.js";
export * from "./stats.js";
