/**
 * Per-request values handed from the HTTP layer to the stores.
 */
export interface RequestContext {
  /** Namespace scope of the request; absent or empty means all namespaces. */
  namespace?: string;
}

export function withNamespace(ctx: RequestContext, namespace: string): RequestContext {
  return { ...ctx, namespace };
}

export function namespaceFrom(ctx: RequestContext): string {
  return ctx.namespace ?? "";
}
