import { Approver } from "../types/contracts.js";

/** Read-only view of the people who can approve requests. */
export interface ApproverDirectory {
  listApprovers(): Promise<Approver[]>;
}

export class StaticDirectory implements ApproverDirectory {
  constructor(private approvers: Approver[]) {}

  async listApprovers(): Promise<Approver[]> {
    return this.approvers;
  }
}
