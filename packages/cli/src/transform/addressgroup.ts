import {
  AddressGroupListResource,
  AddressGroupResource,
  type AddressGroup,
  type AddressGroupList,
} from "@meshlens/types";

import { generateTableElementWithSummary, groupMemberTransform, type GroupMemberView, type TableOutput } from "./common.js";
import { genericFactory } from "./dispatcher.js";

export class AddressGroupResponse implements TableOutput {
  constructor(
    readonly name: string,
    readonly pods: GroupMemberView[],
  ) {}

  getTableHeader(): string[] {
    return ["NAME", "POD-IPS"];
  }

  /** Every member address, in member order. */
  getPodIPs(maxColumnLength: number): string {
    return generateTableElementWithSummary(
      this.pods.flatMap((pod) => pod.ips),
      maxColumnLength,
    );
  }

  getTableRow(maxColumnLength: number): string[] {
    return [this.name, this.getPodIPs(maxColumnLength)];
  }

  sortRows(): boolean {
    return true;
  }
}

export function objectTransform(group: AddressGroup): AddressGroupResponse {
  return new AddressGroupResponse(group.metadata.name, (group.groupMembers ?? []).map(groupMemberTransform));
}

export function listTransform(list: AddressGroupList): AddressGroupResponse[] {
  return list.items.map(objectTransform);
}

export const transform = genericFactory(AddressGroupResource, AddressGroupListResource, objectTransform, listTransform);
