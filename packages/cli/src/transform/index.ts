import { CONTROLPLANE_API_VERSION, STATS_API_VERSION } from "@meshlens/types";

import { transform as transformAddressGroup } from "./addressgroup.js";
import { transform as transformAppliedToGroup } from "./appliedtogroup.js";
import type { TableOutput } from "./common.js";
import type { TransformFunc } from "./dispatcher.js";
import { transform as transformNetworkPolicy } from "./networkpolicy.js";
import { transformAdvancedNetworkPolicyStats, transformNetworkPolicyStats } from "./stats.js";

export interface TransformerRegistration {
  /** Canonical lower-case name used on the command line and in API paths. */
  resource: string;
  aliases: readonly string[];
  kind: string;
  listKind: string;
  apiVersion: string;
  /** Whether the stats apiserver serves this resource. */
  served: boolean;
  transform: TransformFunc<TableOutput>;
}

const REGISTRATIONS: readonly TransformerRegistration[] = [
  {
    resource: "appliedtogroup",
    aliases: ["atg"],
    kind: "AppliedToGroup",
    listKind: "AppliedToGroupList",
    apiVersion: CONTROLPLANE_API_VERSION,
    served: false,
    transform: transformAppliedToGroup,
  },
  {
    resource: "addressgroup",
    aliases: ["ag"],
    kind: "AddressGroup",
    listKind: "AddressGroupList",
    apiVersion: CONTROLPLANE_API_VERSION,
    served: false,
    transform: transformAddressGroup,
  },
  {
    resource: "networkpolicy",
    aliases: ["netpol"],
    kind: "NetworkPolicy",
    listKind: "NetworkPolicyList",
    apiVersion: CONTROLPLANE_API_VERSION,
    served: false,
    transform: transformNetworkPolicy,
  },
  {
    resource: "networkpolicystats",
    aliases: ["nps"],
    kind: "NetworkPolicyStats",
    listKind: "NetworkPolicyStatsList",
    apiVersion: STATS_API_VERSION,
    served: true,
    transform: transformNetworkPolicyStats,
  },
  {
    resource: "advancednetworkpolicystats",
    aliases: ["anps"],
    kind: "AdvancedNetworkPolicyStats",
    listKind: "AdvancedNetworkPolicyStatsList",
    apiVersion: STATS_API_VERSION,
    served: true,
    transform: transformAdvancedNetworkPolicyStats,
  },
];

const BY_NAME = new Map<string, TransformerRegistration>();
for (const registration of REGISTRATIONS) {
  BY_NAME.set(registration.resource, registration);
  for (const alias of registration.aliases) {
    BY_NAME.set(alias, registration);
  }
}

/** Resolves a resource name or alias, case-insensitively. */
export function lookupTransformer(name: string): TransformerRegistration | undefined {
  return BY_NAME.get(name.trim().toLowerCase());
}

export function listResources(): readonly TransformerRegistration[] {
  return REGISTRATIONS;
}

export { AddressGroupResponse } from "./addressgroup.js";
export { AppliedToGroupResponse } from "./appliedtogroup.js";
export {
  NONE_PLACEHOLDER,
  formatIPAddress,
  generateTableElementWithSummary,
  groupMemberTransform,
  memberIdentity,
} from "./common.js";
export type { GroupMemberView, TableOutput } from "./common.js";
export { decode, genericFactory } from "./dispatcher.js";
export type { TransformFunc, TransformSource } from "./dispatcher.js";
export { DecodeError, isDecodeError } from "./errors.js";
export { NetworkPolicyResponse } from "./networkpolicy.js";
export { StatsResponse } from "./stats.js";
