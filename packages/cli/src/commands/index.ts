export { createGetCommand, executeGet, resolveNamespace } from "./get.js";
export { createResourcesCommand, formatResourceTable } from "./resources.js";
export { createServeCommand, startApiServer } from "./serve.js";
export type { RunningApiServer, ServeOptions } from "./serve.js";
export { createTransformCommand, executeTransform } from "./transform.js";
export type { TransformOptions } from "./transform.js";
export { collectVersions, createVersionCommand } from "./version.js";
export type { VersionReport } from "./version.js";
