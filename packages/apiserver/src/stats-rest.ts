import type { ApiList, ApiObject } from "@meshlens/types";

import { namespaceFrom, type RequestContext } from "./context.js";
import { FeatureDisabledError, NotFoundError } from "./errors.js";
import type { FeatureGateSet } from "./features.js";
import type { StatsProvider } from "./provider.js";

/**
 * What the HTTP layer needs from a read-only resource store.
 */
export interface ReadOnlyStore<T extends ApiObject = ApiObject> {
  readonly resource: string;
  readonly kind: string;
  get(ctx: RequestContext, namespace: string, name: string): T;
  list(ctx: RequestContext, namespace?: string): ApiList<T>;
}

export interface StatsRESTOptions<T> {
  /** Plural lower-case resource name used in URLs and messages. */
  resource: string;
  kind: string;
  listKind: string;
  apiVersion: string;
  /** Every gate listed here must be on for any request to be served. */
  requiredFeatures: readonly string[];
  featureGates: FeatureGateSet;
  provider: StatsProvider<T>;
}

/**
 * Read-only storage over a virtual stats resource. Records are owned by the
 * provider; callers always receive copies.
 */
export class StatsREST<T extends ApiObject> implements ReadOnlyStore<T> {
  readonly resource: string;
  readonly kind: string;
  private readonly listKind: string;
  private readonly apiVersion: string;
  private readonly requiredFeatures: readonly string[];
  private readonly featureGates: FeatureGateSet;
  private readonly provider: StatsProvider<T>;

  constructor(options: StatsRESTOptions<T>) {
    this.resource = options.resource;
    this.kind = options.kind;
    this.listKind = options.listKind;
    this.apiVersion = options.apiVersion;
    this.requiredFeatures = [...options.requiredFeatures];
    this.featureGates = options.featureGates;
    this.provider = options.provider;
  }

  get(_ctx: RequestContext, namespace: string, name: string): T {
    this.checkFeatures();

    const record = this.provider.getStats(namespace, name);
    if (record === undefined) {
      throw new NotFoundError(this.resource, namespace, name);
    }

    return this.present(record);
  }

  list(ctx: RequestContext, namespace: string = namespaceFrom(ctx)): ApiList<T> {
    this.checkFeatures();

    const items = this.provider.listStats(namespace).map((record) => this.present(record));
    return {
      kind: this.listKind,
      apiVersion: this.apiVersion,
      metadata: {},
      items,
    };
  }

  /** Copies a provider record and stamps this resource's type on it. */
  private present(record: T): T {
    return { ...structuredClone(record), kind: this.kind, apiVersion: this.apiVersion };
  }

  private checkFeatures(): void {
    const disabled = this.featureGates.firstDisabled(this.requiredFeatures);
    if (disabled !== undefined) {
      throw new FeatureDisabledError(disabled);
    }
  }
}
