import { AuditEvent, Status, WorkRequest } from "../types/contracts.js";

export interface RequestStore {
  init(): Promise<void>;

  createRequest(req: WorkRequest): Promise<void>;
  getRequest(id: string): Promise<WorkRequest | null>;
  listRequests(q?: {
    status?: Status;
    limit?: number;
    offset?: number;
  }): Promise<WorkRequest[]>;
  allRequests(): Promise<WorkRequest[]>;

  saveRequest(req: WorkRequest): Promise<void>;

  appendAudit(ev: AuditEvent): Promise<void>;
  listAudit(requestId: string, limit?: number): Promise<AuditEvent[]>;
}
