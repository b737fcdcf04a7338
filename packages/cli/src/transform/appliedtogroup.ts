import {
  AppliedToGroupListResource,
  AppliedToGroupResource,
  type AppliedToGroup,
  type AppliedToGroupList,
} from "@meshlens/types";

import {
  generateTableElementWithSummary,
  groupMemberTransform,
  memberIdentity,
  type GroupMemberView,
  type TableOutput,
} from "./common.js";
import { genericFactory } from "./dispatcher.js";

export class AppliedToGroupResponse implements TableOutput {
  constructor(
    readonly name: string,
    readonly pods: GroupMemberView[],
  ) {}

  getTableHeader(): string[] {
    return ["NAME", "PODS"];
  }

  getPodNames(maxColumnLength: number): string {
    return generateTableElementWithSummary(this.pods.map(memberIdentity), maxColumnLength);
  }

  getTableRow(maxColumnLength: number): string[] {
    return [this.name, this.getPodNames(maxColumnLength)];
  }

  sortRows(): boolean {
    return true;
  }
}

export function objectTransform(group: AppliedToGroup): AppliedToGroupResponse {
  return new AppliedToGroupResponse(group.metadata.name, (group.groupMembers ?? []).map(groupMemberTransform));
}

export function listTransform(list: AppliedToGroupList): AppliedToGroupResponse[] {
  return list.items.map(objectTransform);
}

export const transform = genericFactory(AppliedToGroupResource, AppliedToGroupListResource, objectTransform, listTransform);
