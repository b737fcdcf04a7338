import { isIP } from "node:net";

import type { ExternalEntityReference, GroupMember, NamedPort, PodReference } from "@meshlens/types";

/**
 * Capability every transform response implements so the presentation layer
 * can print it as a table. `getTableRow` always yields as many cells as
 * `getTableHeader`.
 */
export interface TableOutput {
  getTableHeader(): string[];
  getTableRow(maxColumnLength: number): string[];
  sortRows(): boolean;
}

export const NONE_PLACEHOLDER = "<NONE>";

/** A group member with every address in textual form. */
export interface GroupMemberView {
  pod?: PodReference;
  externalEntity?: ExternalEntityReference;
  ips: string[];
  ports: NamedPort[];
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function formatIPv4(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => String(byte)).join(".");
}

function isIPv4Mapped(bytes: Uint8Array): boolean {
  for (let index = 0; index < 10; index++) {
    if (bytes[index] !== 0) {
      return false;
    }
  }
  return bytes[10] === 0xff && bytes[11] === 0xff;
}

function formatIPv6(bytes: Uint8Array): string {
  const groups: number[] = [];
  for (let index = 0; index < 16; index += 2) {
    groups.push(((bytes[index] ?? 0) << 8) | (bytes[index + 1] ?? 0));
  }

  // longest run of two or more zero groups, leftmost on ties
  let bestStart = -1;
  let bestLength = 0;
  for (let index = 0; index < groups.length; ) {
    if (groups[index] !== 0) {
      index++;
      continue;
    }
    let end = index;
    while (end < groups.length && groups[end] === 0) {
      end++;
    }
    if (end - index > bestLength && end - index >= 2) {
      bestStart = index;
      bestLength = end - index;
    }
    index = end;
  }

  const hex = groups.map((group) => group.toString(16));
  if (bestStart < 0) {
    return hex.join(":");
  }

  const head = hex.slice(0, bestStart).join(":");
  const tail = hex.slice(bestStart + bestLength).join(":");
  return `${head}::${tail}`;
}

/**
 * Renders an address in textual form. Addresses already in textual form pass
 * through; base64 encoded 4 and 16 byte addresses are decoded. Anything else
 * is returned unchanged.
 */
export function formatIPAddress(value: string): string {
  if (isIP(value) !== 0 || value.length === 0 || !BASE64_PATTERN.test(value)) {
    return value;
  }

  const bytes = Buffer.from(value, "base64");
  if (bytes.length === 4) {
    return formatIPv4(bytes);
  }

  if (bytes.length === 16) {
    return isIPv4Mapped(bytes) ? formatIPv4(bytes.subarray(12)) : formatIPv6(bytes);
  }

  return value;
}

export function groupMemberTransform(member: GroupMember): GroupMemberView {
  const view: GroupMemberView = {
    ips: (member.ips ?? []).map(formatIPAddress),
    ports: (member.ports ?? []).map((port) => ({ ...port })),
  };

  if (member.pod !== undefined) {
    view.pod = { ...member.pod };
  }
  if (member.externalEntity !== undefined) {
    view.externalEntity = { ...member.externalEntity };
  }

  return view;
}

export function memberIdentity(member: GroupMemberView): string {
  const reference = member.pod ?? member.externalEntity;
  if (reference !== undefined) {
    return `${reference.namespace}/${reference.name}`;
  }

  return member.ips.join(",");
}

/**
 * Joins `list` with ", " while the text fits in `maxColumnLength`, then
 * reports how many entries did not fit. Entries are never split.
 */
export function generateTableElementWithSummary(list: readonly string[], maxColumnLength: number): string {
  if (list.length === 0) {
    return NONE_PLACEHOLDER;
  }

  let element = "";
  let shown = 0;
  for (const entry of list) {
    const candidate = shown === 0 ? entry : `${element}, ${entry}`;
    if (candidate.length > maxColumnLength) {
      break;
    }
    element = candidate;
    shown++;
  }

  const omitted = list.length - shown;
  if (omitted === 0) {
    return element;
  }

  return shown === 0 ? `+ ${omitted} more...` : `${element} + ${omitted} more...`;
}
