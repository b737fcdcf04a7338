import { isNonNegativeInteger, isPlainObject, parseStringArray } from "./json.js";
import {
  defineResourceType,
  parseApiList,
  parseObjectMeta,
  parseTypeMeta,
  type ApiList,
  type ApiObject,
  type ObjectMeta,
  type ResourceType,
} from "./meta.js";

export const CONTROLPLANE_API_VERSION = "controlplane.meshlens.io/v1beta2";

export type Protocol = "TCP" | "UDP" | "SCTP";

export interface PodReference {
  name: string;
  namespace: string;
}

export interface ExternalEntityReference {
  name: string;
  namespace: string;
}

export interface NamedPort {
  port?: number;
  name?: string;
  protocol?: Protocol;
}

/**
 * A workload selected by a group. `ips` hold either textual addresses or the
 * base64 form of a 4 or 16 byte address.
 */
export interface GroupMember {
  pod?: PodReference;
  externalEntity?: ExternalEntityReference;
  ips?: string[];
  ports?: NamedPort[];
}

export interface AppliedToGroup extends ApiObject {
  groupMembers?: GroupMember[];
}

export type AppliedToGroupList = ApiList<AppliedToGroup>;

export interface AddressGroup extends ApiObject {
  groupMembers?: GroupMember[];
}

export type AddressGroupList = ApiList<AddressGroup>;

export type Direction = "In" | "Out";

export type RuleAction = "Allow" | "Drop" | "Reject" | "Pass";

export interface IPBlock {
  cidr: string;
  except?: string[];
}

export interface NetworkPolicyPeer {
  addressGroups?: string[];
  ipBlocks?: IPBlock[];
}

export interface Service {
  protocol?: Protocol;
  port?: number | string;
  endPort?: number;
}

export interface NetworkPolicyRule {
  direction: Direction;
  name?: string;
  from?: NetworkPolicyPeer;
  to?: NetworkPolicyPeer;
  services?: Service[];
  priority?: number;
  action?: RuleAction;
}

export type NetworkPolicySourceType = "K8sNetworkPolicy" | "AdvancedClusterNetworkPolicy" | "AdvancedNetworkPolicy";

export interface NetworkPolicyReference {
  type: NetworkPolicySourceType;
  namespace?: string;
  name: string;
  uid?: string;
}

export interface NetworkPolicy extends ApiObject {
  rules?: NetworkPolicyRule[];
  appliedToGroups?: string[];
  priority?: number;
  tierPriority?: number;
  sourceRef?: NetworkPolicyReference;
}

export type NetworkPolicyList = ApiList<NetworkPolicy>;

function isProtocol(value: unknown): value is Protocol {
  return value === "TCP" || value === "UDP" || value === "SCTP";
}

function isDirection(value: unknown): value is Direction {
  return value === "In" || value === "Out";
}

function isRuleAction(value: unknown): value is RuleAction {
  return value === "Allow" || value === "Drop" || value === "Reject" || value === "Pass";
}

function isNetworkPolicySourceType(value: unknown): value is NetworkPolicySourceType {
  return value === "K8sNetworkPolicy" || value === "AdvancedClusterNetworkPolicy" || value === "AdvancedNetworkPolicy";
}

function parseNamespacedReference(value: unknown): PodReference | null {
  if (!isPlainObject(value) || typeof value.name !== "string" || typeof value.namespace !== "string") {
    return null;
  }

  return { name: value.name, namespace: value.namespace };
}

/**
 * Decodes a sequence whose elements all go through `parseEntry`; one bad
 * element rejects the whole sequence.
 */
function parseArray<T>(value: unknown, parseEntry: (entry: unknown) => T | null): T[] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const parsed: T[] = [];
  for (const entry of value) {
    const item = parseEntry(entry);
    if (item === null) {
      return null;
    }
    parsed.push(item);
  }

  return parsed;
}

export function parseNamedPort(value: unknown): NamedPort | null {
  if (!isPlainObject(value)) {
    return null;
  }

  const port: NamedPort = {};
  if (value.port !== undefined) {
    if (!isNonNegativeInteger(value.port) || value.port > 65535) {
      return null;
    }
    port.port = value.port;
  }

  if (value.name !== undefined) {
    if (typeof value.name !== "string") {
      return null;
    }
    port.name = value.name;
  }

  if (value.protocol !== undefined) {
    if (!isProtocol(value.protocol)) {
      return null;
    }
    port.protocol = value.protocol;
  }

  return port;
}

export function parseGroupMember(value: unknown): GroupMember | null {
  if (!isPlainObject(value)) {
    return null;
  }

  const member: GroupMember = {};

  if (value.pod !== undefined) {
    const pod = parseNamespacedReference(value.pod);
    if (pod === null) {
      return null;
    }
    member.pod = pod;
  }

  if (value.externalEntity !== undefined) {
    const externalEntity = parseNamespacedReference(value.externalEntity);
    if (externalEntity === null) {
      return null;
    }
    member.externalEntity = externalEntity;
  }

  if (value.ips !== undefined) {
    const ips = parseStringArray(value.ips);
    if (ips === null) {
      return null;
    }
    member.ips = ips;
  }

  if (value.ports !== undefined) {
    const ports = parseArray(value.ports, parseNamedPort);
    if (ports === null) {
      return null;
    }
    member.ports = ports;
  }

  return member;
}

interface MemberGroup extends ApiObject {
  groupMembers?: GroupMember[];
}

function parseMemberGroup(value: unknown): MemberGroup | null {
  if (!isPlainObject(value)) {
    return null;
  }

  const typeMeta = parseTypeMeta(value);
  const metadata = parseObjectMeta(value.metadata);
  if (typeMeta === null || metadata === null) {
    return null;
  }

  const group: MemberGroup = { ...typeMeta, metadata };
  if (value.groupMembers !== undefined && value.groupMembers !== null) {
    const members = parseArray(value.groupMembers, parseGroupMember);
    if (members === null) {
      return null;
    }
    group.groupMembers = members;
  }

  return group;
}

export function parseAppliedToGroup(value: unknown): AppliedToGroup | null {
  return parseMemberGroup(value);
}

export function parseAddressGroup(value: unknown): AddressGroup | null {
  return parseMemberGroup(value);
}

function parseIPBlock(value: unknown): IPBlock | null {
  if (!isPlainObject(value) || typeof value.cidr !== "string") {
    return null;
  }

  const block: IPBlock = { cidr: value.cidr };
  if (value.except !== undefined) {
    const except = parseStringArray(value.except);
    if (except === null) {
      return null;
    }
    block.except = except;
  }

  return block;
}

function parsePeer(value: unknown): NetworkPolicyPeer | null {
  if (!isPlainObject(value)) {
    return null;
  }

  const peer: NetworkPolicyPeer = {};
  if (value.addressGroups !== undefined) {
    const addressGroups = parseStringArray(value.addressGroups);
    if (addressGroups === null) {
      return null;
    }
    peer.addressGroups = addressGroups;
  }

  if (value.ipBlocks !== undefined) {
    const ipBlocks = parseArray(value.ipBlocks, parseIPBlock);
    if (ipBlocks === null) {
      return null;
    }
    peer.ipBlocks = ipBlocks;
  }

  return peer;
}

function parseService(value: unknown): Service | null {
  if (!isPlainObject(value)) {
    return null;
  }

  const service: Service = {};
  if (value.protocol !== undefined) {
    if (!isProtocol(value.protocol)) {
      return null;
    }
    service.protocol = value.protocol;
  }

  const port = value.port;
  if (port !== undefined) {
    if (typeof port !== "string" && !isNonNegativeInteger(port)) {
      return null;
    }
    service.port = port;
  }

  if (value.endPort !== undefined) {
    if (!isNonNegativeInteger(value.endPort)) {
      return null;
    }
    service.endPort = value.endPort;
  }

  return service;
}

export function parseNetworkPolicyRule(value: unknown): NetworkPolicyRule | null {
  if (!isPlainObject(value) || !isDirection(value.direction)) {
    return null;
  }

  const rule: NetworkPolicyRule = { direction: value.direction };

  if (value.name !== undefined) {
    if (typeof value.name !== "string") {
      return null;
    }
    rule.name = value.name;
  }

  for (const side of ["from", "to"] as const) {
    const peerValue = value[side];
    if (peerValue === undefined) {
      continue;
    }
    const peer = parsePeer(peerValue);
    if (peer === null) {
      return null;
    }
    rule[side] = peer;
  }

  if (value.services !== undefined && value.services !== null) {
    const services = parseArray(value.services, parseService);
    if (services === null) {
      return null;
    }
    rule.services = services;
  }

  if (value.priority !== undefined) {
    if (typeof value.priority !== "number") {
      return null;
    }
    rule.priority = value.priority;
  }

  if (value.action !== undefined) {
    if (!isRuleAction(value.action)) {
      return null;
    }
    rule.action = value.action;
  }

  return rule;
}

function parseNetworkPolicyReference(value: unknown): NetworkPolicyReference | null {
  if (!isPlainObject(value) || !isNetworkPolicySourceType(value.type) || typeof value.name !== "string") {
    return null;
  }

  const reference: NetworkPolicyReference = { type: value.type, name: value.name };
  if (value.namespace !== undefined) {
    if (typeof value.namespace !== "string") {
      return null;
    }
    reference.namespace = value.namespace;
  }

  if (value.uid !== undefined) {
    if (typeof value.uid !== "string") {
      return null;
    }
    reference.uid = value.uid;
  }

  return reference;
}

export function parseNetworkPolicy(value: unknown): NetworkPolicy | null {
  if (!isPlainObject(value)) {
    return null;
  }

  const typeMeta = parseTypeMeta(value);
  const metadata: ObjectMeta | null = parseObjectMeta(value.metadata);
  if (typeMeta === null || metadata === null) {
    return null;
  }

  const policy: NetworkPolicy = { ...typeMeta, metadata };

  if (value.rules !== undefined && value.rules !== null) {
    const rules = parseArray(value.rules, parseNetworkPolicyRule);
    if (rules === null) {
      return null;
    }
    policy.rules = rules;
  }

  if (value.appliedToGroups !== undefined && value.appliedToGroups !== null) {
    const appliedToGroups = parseStringArray(value.appliedToGroups);
    if (appliedToGroups === null) {
      return null;
    }
    policy.appliedToGroups = appliedToGroups;
  }

  for (const field of ["priority", "tierPriority"] as const) {
    const fieldValue = value[field];
    if (fieldValue === undefined) {
      continue;
    }
    if (typeof fieldValue !== "number" || !Number.isFinite(fieldValue)) {
      return null;
    }
    policy[field] = fieldValue;
  }

  if (value.sourceRef !== undefined) {
    const sourceRef = parseNetworkPolicyReference(value.sourceRef);
    if (sourceRef === null) {
      return null;
    }
    policy.sourceRef = sourceRef;
  }

  return policy;
}

export const AppliedToGroupResource: ResourceType<AppliedToGroup> = defineResourceType(
  "AppliedToGroup",
  parseAppliedToGroup,
);

export const AppliedToGroupListResource: ResourceType<AppliedToGroupList> = defineResourceType(
  "AppliedToGroupList",
  (value) => parseApiList(value, "AppliedToGroup", parseAppliedToGroup),
);

export const AddressGroupResource: ResourceType<AddressGroup> = defineResourceType("AddressGroup", parseAddressGroup);

export const AddressGroupListResource: ResourceType<AddressGroupList> = defineResourceType(
  "AddressGroupList",
  (value) => parseApiList(value, "AddressGroup", parseAddressGroup),
);

export const NetworkPolicyResource: ResourceType<NetworkPolicy> = defineResourceType("NetworkPolicy", parseNetworkPolicy);

export const NetworkPolicyListResource: ResourceType<NetworkPolicyList> = defineResourceType(
  "NetworkPolicyList",
  (value) => parseApiList(value, "NetworkPolicy", parseNetworkPolicy),
);
