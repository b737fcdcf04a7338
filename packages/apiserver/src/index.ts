export { resolveServerConfig, parsePort, DEFAULT_API_HOST, DEFAULT_API_PORT } from "./config.js";
export type { ResolveServerConfigOptions, ResolvedServerConfig } from "./config.js";
export { withNamespace, namespaceFrom } from "./context.js";
export type { RequestContext } from "./context.js";
export {
  ApiError,
  ConfigError,
  FeatureDisabledError,
  NotFoundError,
  ProviderError,
  isApiError,
  isFeatureDisabledError,
  isNotFoundError,
} from "./errors.js";
export type { ApiErrorDetails, StatusReason } from "./errors.js";
export {
  AdvancedPolicyFeature,
  DEFAULT_FEATURE_SPECS,
  FeatureGateSet,
  NetworkPolicyStatsFeature,
  parseFeatureGates,
} from "./features.js";
export type { FeatureSpec, FeatureStage } from "./features.js";
export { InMemoryStatsProvider } from "./provider.js";
export type { StatsProvider } from "./provider.js";
export { createApiNodeServer, createApiRequestHandler, parseApiRoute } from "./server.js";
export { emptySnapshot, loadStatsSnapshot, parseStatsSnapshot } from "./snapshot.js";
export type { StatsSnapshot } from "./snapshot.js";
export { createStatsRegistry, providersFromSnapshot } from "./stats-registry.js";
export type { StatsProviders, StoreRegistry } from "./stats-registry.js";
export { StatsREST } from "./stats-rest.js";
export type { ReadOnlyStore, StatsRESTOptions } from "./stats-rest.js";
export type { APIResource, APIResourceList, ApiServerOptions, ServerLogger, StatusPayload } from "./types.js";
