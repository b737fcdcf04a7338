import { isPlainObject, type JsonObject, type ResourceType } from "@meshlens/types";

import { DecodeError } from "./errors.js";

/** UTF-8 JSON text or bytes, or a document that is already decoded. */
export type TransformSource = string | Uint8Array | JsonObject;

/**
 * Decodes `source` as one object (`single`) or as a list and converts it to
 * display responses.
 */
export interface TransformFunc<R> {
  (source: TransformSource, single: true): R;
  (source: TransformSource, single: false): R[];
  (source: TransformSource, single: boolean): R | R[];
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readDocument(source: TransformSource, expectedKind: string): unknown {
  if (typeof source !== "string" && !(source instanceof Uint8Array)) {
    return source;
  }

  let text: string;
  try {
    text = typeof source === "string" ? source : utf8.decode(source);
  } catch (error) {
    throw new DecodeError(`unable to decode ${expectedKind}: input is not valid UTF-8`, { expectedKind }, { cause: error });
  }

  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (error) {
    throw new DecodeError(`unable to decode ${expectedKind}: ${errorMessage(error)}`, { expectedKind }, { cause: error });
  }
}

export function decode<T>(source: TransformSource, type: ResourceType<T>): T {
  const expectedKind = type.kind;
  const document = readDocument(source, expectedKind);

  if (!isPlainObject(document)) {
    throw new DecodeError(`unable to decode ${expectedKind}: document is not an object`, { expectedKind });
  }

  const actualKind = typeof document.kind === "string" ? document.kind : undefined;
  if (actualKind !== undefined && actualKind !== expectedKind) {
    throw new DecodeError(`unable to decode ${expectedKind}: document has kind ${actualKind}`, {
      expectedKind,
      actualKind,
    });
  }

  const value = type.parse(document);
  if (value === null) {
    throw new DecodeError(`unable to decode ${expectedKind}: document does not match the ${expectedKind} schema`, {
      expectedKind,
      actualKind,
    });
  }

  return value;
}

/**
 * Builds the transform function of one resource from its single and list
 * descriptors and conversions. Decoding failures surface as DecodeError.
 */
export function genericFactory<O, L, R>(
  objectType: ResourceType<O>,
  listType: ResourceType<L>,
  objectTransform: (object: O) => R,
  listTransform: (list: L) => R[],
): TransformFunc<R> {
  function transform(source: TransformSource, single: true): R;
  function transform(source: TransformSource, single: false): R[];
  function transform(source: TransformSource, single: boolean): R | R[];
  function transform(source: TransformSource, single: boolean): R | R[] {
    if (single) {
      return objectTransform(decode(source, objectType));
    }

    return listTransform(decode(source, listType));
  }

  return transform;
}
