import {
  NetworkPolicyListResource,
  NetworkPolicyResource,
  type NetworkPolicy,
  type NetworkPolicyList,
  type NetworkPolicyReference,
  type NetworkPolicyRule,
} from "@meshlens/types";

import { NONE_PLACEHOLDER, generateTableElementWithSummary, type TableOutput } from "./common.js";
import { genericFactory } from "./dispatcher.js";

export class NetworkPolicyResponse implements TableOutput {
  readonly name: string;
  readonly namespace?: string;
  readonly appliedToGroups: string[];
  readonly rules: NetworkPolicyRule[];
  readonly sourceRef?: NetworkPolicyReference;
  readonly priority?: number;

  constructor(fields: {
    name: string;
    namespace?: string;
    appliedToGroups: string[];
    rules: NetworkPolicyRule[];
    sourceRef?: NetworkPolicyReference;
    priority?: number;
  }) {
    this.name = fields.name;
    this.namespace = fields.namespace;
    this.appliedToGroups = fields.appliedToGroups;
    this.rules = fields.rules;
    this.sourceRef = fields.sourceRef;
    this.priority = fields.priority;
  }

  getTableHeader(): string[] {
    return ["NAME", "APPLIED-TO", "RULES", "SOURCE", "PRIORITY"];
  }

  getSource(): string {
    if (this.sourceRef === undefined) {
      return NONE_PLACEHOLDER;
    }

    const { type, namespace, name } = this.sourceRef;
    return namespace === undefined || namespace.length === 0 ? `${type}:${name}` : `${type}:${namespace}/${name}`;
  }

  getTableRow(maxColumnLength: number): string[] {
    return [
      this.name,
      generateTableElementWithSummary(this.appliedToGroups, maxColumnLength),
      String(this.rules.length),
      this.getSource(),
      this.priority === undefined ? NONE_PLACEHOLDER : String(this.priority),
    ];
  }

  sortRows(): boolean {
    return true;
  }
}

export function objectTransform(policy: NetworkPolicy): NetworkPolicyResponse {
  return new NetworkPolicyResponse({
    name: policy.metadata.name,
    namespace: policy.metadata.namespace,
    appliedToGroups: [...(policy.appliedToGroups ?? [])],
    rules: structuredClone(policy.rules ?? []),
    sourceRef: policy.sourceRef === undefined ? undefined : { ...policy.sourceRef },
    priority: policy.priority,
  });
}

export function listTransform(list: NetworkPolicyList): NetworkPolicyResponse[] {
  return list.items.map(objectTransform);
}

export const transform = genericFactory(NetworkPolicyResource, NetworkPolicyListResource, objectTransform, listTransform);
