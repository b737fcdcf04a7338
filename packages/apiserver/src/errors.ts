export type StatusReason = "FeatureDisabled" | "NotFound" | "InternalError" | "BadRequest" | "MethodNotAllowed";

export interface ApiErrorDetails {
  code: string;
  message: string;
  status: number;
  reason: StatusReason;
}

export class ApiError extends Error implements ApiErrorDetails {
  code: string;

  status: number;

  reason: StatusReason;

  constructor(details: ApiErrorDetails, options?: ErrorOptions) {
    super(details.message, options);
    this.name = "ApiError";
    this.code = details.code;
    this.status = details.status;
    this.reason = details.reason;
  }
}

/**
 * A feature gate the operation depends on is off. Enabling it needs an
 * operator configuration change.
 */
export class FeatureDisabledError extends ApiError {
  readonly feature: string;

  constructor(feature: string) {
    super({
      code: "FEATURE_DISABLED",
      message: `feature ${feature} disabled, enable it with --feature-gates=${feature}=true`,
      status: 400,
      reason: "FeatureDisabled",
    });
    this.name = "FeatureDisabledError";
    this.feature = feature;
  }
}

export class NotFoundError extends ApiError {
  readonly resource: string;

  readonly namespace: string;

  readonly resourceName: string;

  constructor(resource: string, namespace: string, name: string) {
    super({
      code: "NOT_FOUND",
      message:
        namespace.length > 0
          ? `${resource} "${name}" not found in namespace "${namespace}"`
          : `${resource} "${name}" not found`,
      status: 404,
      reason: "NotFound",
    });
    this.name = "NotFoundError";
    this.resource = resource;
    this.namespace = namespace;
    this.resourceName = name;
  }
}

/** Raised by provider implementations; the store passes it on unchanged. */
export class ProviderError extends ApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(
      {
        code: "PROVIDER_ERROR",
        message,
        status: 500,
        reason: "InternalError",
      },
      options,
    );
    this.name = "ProviderError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isApiError(value: unknown): value is ApiError {
  return value instanceof ApiError;
}

export function isFeatureDisabledError(value: unknown): value is FeatureDisabledError {
  return value instanceof FeatureDisabledError;
}

export function isNotFoundError(value: unknown): value is NotFoundError {
  return value instanceof NotFoundError;
}
