import type { StoreRegistry } from "./stats-registry.js";

/**
 * Logging sink accepted by the HTTP layer. The CLI logger satisfies it.
 */
export interface ServerLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface ApiServerOptions {
  stores: StoreRegistry;
  logger?: ServerLogger;
  /** Reported by GET /version. */
  version?: string;
}

export interface StatusPayload {
  kind: "Status";
  apiVersion: "v1";
  status: "Failure";
  message: string;
  reason: string;
  code: number;
}

export interface APIResource {
  name: string;
  namespaced: boolean;
  kind: string;
  verbs: string[];
}

export interface APIResourceList {
  kind: "APIResourceList";
  apiVersion: "v1";
  groupVersion: string;
  resources: APIResource[];
}
