import { STATS_API_VERSION, isJsonObject, isPlainObject, type JsonObject } from "@meshlens/types";

import { CliError, featureDisabledError, networkError, notFoundError } from "../errors.js";

export interface StatsClient {
  /** Lists `resource` in `namespace`, or in every namespace when it is empty. */
  list(resource: string, namespace: string): Promise<JsonObject>;
  get(resource: string, namespace: string, name: string): Promise<JsonObject>;
  serverVersion(): Promise<string>;
}

interface StatusBody {
  message: string;
  reason: string;
}

function normalizeServerUrl(serverUrl: string): string {
  return serverUrl.endsWith("/") ? serverUrl.slice(0, -1) : serverUrl;
}

function parseStatusBody(value: unknown): StatusBody | undefined {
  if (!isPlainObject(value) || value.kind !== "Status") {
    return undefined;
  }

  const { message, reason } = value;
  if (typeof message !== "string" || typeof reason !== "string") {
    return undefined;
  }

  return { message, reason };
}

function featureFromMessage(message: string): string | undefined {
  const match = /^feature (\S+) disabled/.exec(message);
  return match?.[1];
}

export class HttpStatsClient implements StatsClient {
  private readonly serverUrl: string;

  constructor(serverUrl: string) {
    this.serverUrl = normalizeServerUrl(serverUrl);
  }

  resourcePath(resource: string, namespace: string, name?: string): string {
    const base = `${this.serverUrl}/apis/${STATS_API_VERSION}`;
    const scoped =
      namespace.length === 0
        ? `${base}/${encodeURIComponent(resource)}`
        : `${base}/namespaces/${encodeURIComponent(namespace)}/${encodeURIComponent(resource)}`;

    return name === undefined ? scoped : `${scoped}/${encodeURIComponent(name)}`;
  }

  async list(resource: string, namespace: string): Promise<JsonObject> {
    return this.requestObject(this.resourcePath(resource, namespace));
  }

  async get(resource: string, namespace: string, name: string): Promise<JsonObject> {
    return this.requestObject(this.resourcePath(resource, namespace, name));
  }

  async serverVersion(): Promise<string> {
    const body = await this.requestObject(`${this.serverUrl}/version`);
    const version = body["version"];
    if (typeof version !== "string") {
      throw networkError(`unexpected /version response from ${this.serverUrl}`);
    }
    return version;
  }

  private async requestObject(url: string): Promise<JsonObject> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw networkError(`unable to reach ${this.serverUrl}: ${reason}`, "Start the server with `mlctl serve` or pass --server.");
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw networkError(`invalid JSON response from ${url} (HTTP ${response.status})`, undefined, error);
    }

    if (!response.ok) {
      throw this.statusError(response.status, body);
    }

    if (!isJsonObject(body)) {
      throw networkError(`unexpected response from ${url}: expected a JSON object`);
    }

    return body;
  }

  private statusError(status: number, body: unknown): CliError {
    const statusBody = parseStatusBody(body);
    const message = statusBody?.message ?? `request failed with HTTP ${status}`;

    if (statusBody?.reason === "FeatureDisabled") {
      return featureDisabledError(message, featureFromMessage(message));
    }

    if (status === 404) {
      return notFoundError(message);
    }

    return networkError(`server responded with HTTP ${status}: ${message}`);
  }
}
