import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";

import { STATS_API_GROUP, STATS_API_VERSION } from "@meshlens/types";

import type { RequestContext } from "./context.js";
import { isApiError } from "./errors.js";
import type { ReadOnlyStore } from "./stats-rest.js";
import type { APIResourceList, ApiServerOptions, ServerLogger, StatusPayload } from "./types.js";

interface HealthRoute {
  type: "healthz";
}

interface VersionRoute {
  type: "version";
}

interface DiscoveryRoute {
  type: "discovery";
}

interface ListRoute {
  type: "list";
  resource: string;
  namespace: string;
}

interface GetRoute {
  type: "get";
  resource: string;
  namespace: string;
  name: string;
}

type ParsedRoute = HealthRoute | VersionRoute | DiscoveryRoute | ListRoute | GetRoute;

const STATS_VERSION = STATS_API_VERSION.slice(STATS_API_GROUP.length + 1);

const NOOP_LOGGER: ServerLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createApiRequestHandler(options: ApiServerOptions): (request: Request) => Promise<Response> {
  const logger = options.logger ?? NOOP_LOGGER;
  const version = options.version ?? "UNKNOWN";

  return async (request: Request): Promise<Response> => {
    const url = new URL(request.url);
    const response = await dispatch(options, version, request, url, logger);
    logger.debug(`${request.method} ${url.pathname} ${response.status}`);
    return response;
  };
}

async function dispatch(
  options: ApiServerOptions,
  version: string,
  request: Request,
  url: URL,
  logger: ServerLogger,
): Promise<Response> {
  const route = parseApiRoute(url.pathname);
  if (route === null) {
    return createStatusResponse(404, "NotFound", `the server could not find the requested resource ${url.pathname}`);
  }

  if (request.method !== "GET" && request.method !== "HEAD") {
    return createStatusResponse(405, "MethodNotAllowed", `method ${request.method} is not supported`);
  }

  if (route.type === "healthz") {
    return new Response("ok", { status: 200, headers: { "content-type": "text/plain; charset=utf-8" } });
  }

  if (route.type === "version") {
    return createJsonResponse(200, { version });
  }

  if (route.type === "discovery") {
    return createJsonResponse(200, buildDiscovery(options.stores.values()));
  }

  const store = options.stores.get(route.resource);
  if (store === undefined) {
    return createStatusResponse(404, "NotFound", `the server could not find the requested resource ${route.resource}`);
  }

  const ctx: RequestContext = { namespace: route.namespace };

  try {
    if (route.type === "get") {
      return createJsonResponse(200, store.get(ctx, route.namespace, route.name));
    }

    return createJsonResponse(200, store.list(ctx));
  } catch (error) {
    if (isApiError(error)) {
      if (error.status >= 500) {
        logger.error(`${route.type} ${route.resource} failed: ${error.message}`);
      }
      return createStatusResponse(error.status, error.reason, error.message);
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error(`${route.type} ${route.resource} failed: ${message}`);
    return createStatusResponse(500, "InternalError", message);
  }
}

/**
 * Recognized paths:
 *   /healthz, /version, /apis/<group>/<version>,
 *   /apis/<group>/<version>/<resource>,
 *   /apis/<group>/<version>/namespaces/<namespace>/<resource>[/<name>]
 */
export function parseApiRoute(pathname: string): ParsedRoute | null {
  const segments: string[] = [];

  for (const part of pathname.split("/")) {
    if (part.length === 0) {
      continue;
    }

    try {
      segments.push(decodeURIComponent(part));
    } catch {
      return null;
    }
  }

  const [first, group, groupVersion, ...rest] = segments;

  if (segments.length === 1 && first === "healthz") {
    return { type: "healthz" };
  }

  if (segments.length === 1 && first === "version") {
    return { type: "version" };
  }

  if (first !== "apis" || group !== STATS_API_GROUP || groupVersion !== STATS_VERSION) {
    return null;
  }

  const [fourth, namespace, resource, name] = rest;

  if (fourth === undefined) {
    return { type: "discovery" };
  }

  if (rest.length === 1) {
    return { type: "list", resource: fourth, namespace: "" };
  }

  if (fourth !== "namespaces" || namespace === undefined || resource === undefined) {
    return null;
  }

  if (rest.length === 3) {
    return { type: "list", resource, namespace };
  }

  if (rest.length === 4 && name !== undefined) {
    return { type: "get", resource, namespace, name };
  }

  return null;
}

function buildDiscovery(stores: Iterable<ReadOnlyStore>): APIResourceList {
  const resources = [...stores].map((store) => ({
    name: store.resource,
    namespaced: true,
    kind: store.kind,
    verbs: ["get", "list"],
  }));

  return {
    kind: "APIResourceList",
    apiVersion: "v1",
    groupVersion: STATS_API_VERSION,
    resources,
  };
}

export function createApiNodeServer(options: ApiServerOptions): Server {
  const handler = createApiRequestHandler(options);

  return createServer((request, response) => {
    handleNodeRequest(handler, request, response).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      options.logger?.error(`request handling failed: ${message}`);
      if (!response.headersSent) {
        response.statusCode = 500;
      }
      response.end();
    });
  });
}

async function handleNodeRequest(
  handler: (request: Request) => Promise<Response>,
  request: IncomingMessage,
  response: ServerResponse,
): Promise<void> {
  const webRequest = toWebRequest(request);
  const webResponse = await handler(webRequest);
  await sendWebResponse(response, webResponse);
}

function createJsonResponse(status: number, payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: {
      "content-type": "application/json; charset=utf-8",
    },
  });
}

function createStatusResponse(code: number, reason: string, message: string): Response {
  const payload: StatusPayload = {
    kind: "Status",
    apiVersion: "v1",
    status: "Failure",
    message,
    reason,
    code,
  };

  return createJsonResponse(code, payload);
}

/** Bodies are never read: every served route is a GET. */
function toWebRequest(request: IncomingMessage): Request {
  const method = request.method ?? "GET";
  const host = request.headers.host ?? "localhost";
  const url = new URL(request.url ?? "/", `http://${host}`);

  const headers = new Headers();
  for (const [key, value] of Object.entries(request.headers)) {
    if (typeof value === "string") {
      headers.set(key, value);
      continue;
    }

    if (Array.isArray(value)) {
      for (const entry of value) {
        headers.append(key, entry);
      }
    }
  }

  return new Request(url, { method, headers });
}

async function sendWebResponse(response: ServerResponse, webResponse: Response): Promise<void> {
  response.statusCode = webResponse.status;

  for (const [key, value] of webResponse.headers.entries()) {
    response.setHeader(key, value);
  }

  const body = Buffer.from(await webResponse.arrayBuffer());
  response.end(body);
}
