import { isNonNegativeInteger, isPlainObject, parseStringRecord } from "./json.js";

export interface TypeMeta {
  kind?: string;
  apiVersion?: string;
}

export interface ObjectMeta {
  name: string;
  namespace?: string;
  uid?: string;
  resourceVersion?: string;
  generation?: number;
  creationTimestamp?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

export interface ListMeta {
  resourceVersion?: string;
  continue?: string;
}

export interface ApiObject extends TypeMeta {
  metadata: ObjectMeta;
}

export interface ApiList<T> extends TypeMeta {
  metadata?: ListMeta;
  items: T[];
}

/**
 * Static descriptor of one decodable kind. `parse` validates an already
 * JSON-decoded value and returns `null` when the shape does not match.
 */
export interface ResourceType<T> {
  readonly kind: string;
  parse(value: unknown): T | null;
}

export function defineResourceType<T>(kind: string, parse: (value: unknown) => T | null): ResourceType<T> {
  return { kind, parse };
}

export function parseTypeMeta(value: Record<string, unknown>): TypeMeta | null {
  const typeMeta: TypeMeta = {};

  if (value.kind !== undefined) {
    if (typeof value.kind !== "string") {
      return null;
    }
    typeMeta.kind = value.kind;
  }

  if (value.apiVersion !== undefined) {
    if (typeof value.apiVersion !== "string") {
      return null;
    }
    typeMeta.apiVersion = value.apiVersion;
  }

  return typeMeta;
}

const OPTIONAL_META_STRINGS = ["namespace", "uid", "resourceVersion", "creationTimestamp"] as const;

export function parseObjectMeta(value: unknown): ObjectMeta | null {
  if (!isPlainObject(value) || typeof value.name !== "string") {
    return null;
  }

  const metadata: ObjectMeta = { name: value.name };

  for (const field of OPTIONAL_META_STRINGS) {
    const fieldValue = value[field];
    if (fieldValue === undefined || fieldValue === null) {
      continue;
    }
    if (typeof fieldValue !== "string") {
      return null;
    }
    metadata[field] = fieldValue;
  }

  if (value.generation !== undefined) {
    if (!isNonNegativeInteger(value.generation)) {
      return null;
    }
    metadata.generation = value.generation;
  }

  if (value.labels !== undefined) {
    const labels = parseStringRecord(value.labels);
    if (labels === null) {
      return null;
    }
    metadata.labels = labels;
  }

  if (value.annotations !== undefined) {
    const annotations = parseStringRecord(value.annotations);
    if (annotations === null) {
      return null;
    }
    metadata.annotations = annotations;
  }

  return metadata;
}

export function parseListMeta(value: unknown): ListMeta | null {
  if (!isPlainObject(value)) {
    return null;
  }

  const listMeta: ListMeta = {};
  if (value.resourceVersion !== undefined) {
    if (typeof value.resourceVersion !== "string") {
      return null;
    }
    listMeta.resourceVersion = value.resourceVersion;
  }

  if (value.continue !== undefined) {
    if (typeof value.continue !== "string") {
      return null;
    }
    listMeta.continue = value.continue;
  }

  return listMeta;
}

/**
 * Parses a list document. Every element must parse with `parseItem`, and an
 * element that declares its own kind must declare `itemKind`.
 */
export function parseApiList<T extends TypeMeta>(
  value: unknown,
  itemKind: string,
  parseItem: (item: unknown) => T | null,
): ApiList<T> | null {
  if (!isPlainObject(value)) {
    return null;
  }

  const typeMeta = parseTypeMeta(value);
  if (typeMeta === null) {
    return null;
  }

  const list: ApiList<T> = { ...typeMeta, items: [] };

  if (value.metadata !== undefined) {
    const listMeta = parseListMeta(value.metadata);
    if (listMeta === null) {
      return null;
    }
    list.metadata = listMeta;
  }

  // a list encoded from an empty slice may carry "items": null
  if (value.items === undefined || value.items === null) {
    return list;
  }

  if (!Array.isArray(value.items)) {
    return null;
  }

  for (const entry of value.items) {
    const item = parseItem(entry);
    if (item === null) {
      return null;
    }
    if (item.kind !== undefined && item.kind !== itemKind) {
      return null;
    }
    list.items.push(item);
  }

  return list;
}

export function namespacedName(metadata: Pick<ObjectMeta, "namespace" | "name">): string {
  if (metadata.namespace === undefined || metadata.namespace.length === 0) {
    return metadata.name;
  }

  return `${metadata.namespace}/${metadata.name}`;
}
